/**
 * Schema loading utility
 */

import { readFileSync } from 'fs';
import { join } from 'path';
import { fileURLToPath } from 'url';

const PROJECT_ROOT = fileURLToPath(new URL('../../', import.meta.url));

export type Schema = {
  $schema: string;
  $id: string;
  type: string;
  required?: string[];
  properties?: Record<string, unknown>;
};

const schemaCache = new Map<string, Schema>();

export function loadSchema(schemaName: string, projectRoot: string = PROJECT_ROOT): Schema {
  const cacheKey = `${projectRoot}::${schemaName}`;
  const cached = schemaCache.get(cacheKey);
  if (cached) {
    return cached;
  }

  const schemaPath = join(projectRoot, 'schemas', `${schemaName}.schema.json`);
  const schemaJson = readFileSync(schemaPath, 'utf-8');
  const schema = JSON.parse(schemaJson) as Schema;

  schemaCache.set(cacheKey, schema);
  return schema;
}

export function getOwnershipSnapshotSchema(): Schema {
  return loadSchema('ownership_snapshot.v1');
}
