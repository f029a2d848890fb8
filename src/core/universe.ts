/**
 * Universe management - supplies the security ids an ingestion run covers
 */

import { existsSync, readFileSync } from 'fs';
import { isAbsolute, join } from 'path';
import type { SecurityId } from '@/types/snapshot';

export interface UniverseProvider {
  readonly name: string;
  /** Eligible (equity-only) security ids, taken once per run. */
  listEligibleSecurities(): Promise<SecurityId[]>;
}

export interface UniverseConfig {
  name: string;
  symbols: string[];
  version?: string;
  selection_rule?: string;
}

const SECURITY_ID_PATTERN = /^[A-Z0-9._-]+$/;

export function normalizeSecurityId(symbol: string): SecurityId {
  const normalized = symbol.trim().toUpperCase();
  if (!normalized) {
    throw new Error('Security id must be non-empty');
  }
  if (!SECURITY_ID_PATTERN.test(normalized) || normalized === '.' || normalized === '..') {
    throw new Error(`Invalid security id: ${symbol}`);
  }
  return normalized;
}

export function isSecurityId(value: string): boolean {
  try {
    normalizeSecurityId(value);
    return true;
  } catch {
    return false;
  }
}

/** Normalises and de-duplicates, keeping first-seen order; invalid entries are dropped. */
export function normalizeSecurityList(values: readonly unknown[]): SecurityId[] {
  const out: SecurityId[] = [];
  const seen = new Set<string>();
  for (const value of values) {
    if (typeof value !== 'string' || !isSecurityId(value)) continue;
    const id = normalizeSecurityId(value);
    if (!seen.has(id)) {
      seen.add(id);
      out.push(id);
    }
  }
  return out;
}

/** Splits requested ids into normalised valid ids and the raw ids that are malformed. */
export function partitionSecurityIds(values: readonly string[]): { valid: SecurityId[]; invalid: string[] } {
  const invalid: string[] = [];
  for (const value of values) {
    if (!isSecurityId(value) && !invalid.includes(value)) {
      invalid.push(value);
    }
  }
  return { valid: normalizeSecurityList(values), invalid };
}

function resolveUniversePath(projectRoot: string, universe: string | undefined): string {
  const configDir = join(projectRoot, 'config');
  if (!universe) {
    return join(configDir, 'universes', 'default.json');
  }
  if (isAbsolute(universe)) {
    return universe;
  }
  if (universe.endsWith('.json') || universe.includes('/')) {
    return universe.startsWith('config/') ? join(projectRoot, universe) : join(configDir, universe);
  }
  return join(configDir, 'universes', `${universe}.json`);
}

function normalizeUniverse(raw: unknown): UniverseConfig {
  const parsed: object = raw && typeof raw === 'object' && !Array.isArray(raw) ? raw : {};
  const name = 'name' in parsed && typeof parsed.name === 'string' ? parsed.name : 'Universe';
  const symbols = 'symbols' in parsed && Array.isArray(parsed.symbols) ? parsed.symbols : [];
  const version = 'version' in parsed && typeof parsed.version === 'string' ? parsed.version : '1';
  const selectionRule =
    'selection_rule' in parsed && typeof parsed.selection_rule === 'string' ? parsed.selection_rule : '';

  return {
    name,
    version,
    selection_rule: selectionRule,
    symbols: normalizeSecurityList(symbols),
  };
}

export function loadUniverse(projectRoot: string = process.cwd(), universe: string | undefined = process.env.UNIVERSE): UniverseConfig {
  const universePath = resolveUniversePath(projectRoot, universe);
  if (!existsSync(universePath)) {
    throw new Error(`Universe pack not found: ${universePath}`);
  }
  return normalizeUniverse(JSON.parse(readFileSync(universePath, 'utf-8')));
}

/** Universe backed by a JSON pack under config/universes/ or an explicit id list. */
export class StaticUniverseProvider implements UniverseProvider {
  readonly name: string;
  private readonly symbols: SecurityId[];

  constructor(config: UniverseConfig) {
    this.name = config.name;
    this.symbols = normalizeSecurityList(config.symbols);
  }

  static fromIds(ids: readonly string[], name = 'Explicit list'): StaticUniverseProvider {
    return new StaticUniverseProvider({ name, symbols: [...ids] });
  }

  static fromPack(projectRoot?: string, universe?: string): StaticUniverseProvider {
    return new StaticUniverseProvider(loadUniverse(projectRoot, universe));
  }

  async listEligibleSecurities(): Promise<SecurityId[]> {
    return [...this.symbols];
  }
}
