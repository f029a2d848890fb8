export interface BackoffConfig {
  backoffBaseMs: number;
  backoffJitterMs: number;
}

/** Delay before retrying after failed attempt number `attempt` (1-based). */
export function backoffDelay(attempt: number, config: BackoffConfig, random: () => number = Math.random): number {
  const exponent = Math.max(0, attempt - 1);
  return config.backoffBaseMs * 2 ** exponent + random() * config.backoffJitterMs;
}
