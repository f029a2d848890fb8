import { readFileSync } from 'fs';
import { Agent } from 'https';
import type { TlsPolicy } from '@/core/config';
import { ConfigError, errorMessage } from '@/core/errors';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('tls');

export function createHttpsAgent(policy: TlsPolicy): Agent {
  switch (policy.mode) {
    case 'always':
      return new Agent({ keepAlive: true, rejectUnauthorized: true });
    case 'custom-ca': {
      let ca: Buffer;
      try {
        ca = readFileSync(policy.caPath);
      } catch (error) {
        throw new ConfigError(`Cannot read CA bundle ${policy.caPath}: ${errorMessage(error)}`);
      }
      logger.info({ caPath: policy.caPath }, 'Using custom CA bundle for TLS verification');
      return new Agent({ keepAlive: true, rejectUnauthorized: true, ca });
    }
    case 'disabled':
      logger.warn('TLS certificate verification is DISABLED (ALLOW_INSECURE_TLS=true)');
      return new Agent({ keepAlive: true, rejectUnauthorized: false });
  }
}
