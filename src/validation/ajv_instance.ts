/**
 * Ajv validation instance for stored snapshot records.
 *
 * JSON Schema covers field types and ranges; the bracket-scale rules that a
 * schema cannot express (contiguous tier ids, zero-holder tiers, share totals)
 * are checked afterwards in `validateSnapshot`.
 */

import Ajv2020, { type ValidateFunction } from 'ajv/dist/2020';
import addFormats from 'ajv-formats';
import { getOwnershipSnapshotSchema } from './schema_loader';
import type { OwnershipSnapshot } from '@/types/snapshot';

const ajv = new Ajv2020({
  allErrors: true,
  strict: true,
  strictTypes: true,
  strictTuples: true,
  allowUnionTypes: true,
});

addFormats(ajv);

let snapshotValidator: ValidateFunction<OwnershipSnapshot> | null = null;

export function getSnapshotValidator(): ValidateFunction<OwnershipSnapshot> {
  if (!snapshotValidator) {
    snapshotValidator = ajv.compile<OwnershipSnapshot>(getOwnershipSnapshotSchema());
  }
  return snapshotValidator;
}

export interface ValidationResult<T> {
  valid: boolean;
  data: T | null;
  errors: string[] | null;
}

export function checkBracketScale(snapshot: OwnershipSnapshot): string[] {
  const errors: string[] = [];
  let shareSum = 0;

  snapshot.brackets.forEach((bracket, index) => {
    if (bracket.bracketId !== index + 1) {
      errors.push(`/brackets/${index}: expected bracketId ${index + 1}, got ${bracket.bracketId}`);
    }
    if (bracket.holderCount === 0 && bracket.shareCount !== 0) {
      errors.push(`/brackets/${index}: shareCount must be 0 when holderCount is 0`);
    }
    shareSum += bracket.shareCount;
  });

  if (shareSum > snapshot.totalShares) {
    errors.push(`/brackets: share sum ${shareSum} exceeds totalShares ${snapshot.totalShares}`);
  }

  return errors;
}

export function validateSnapshot(data: unknown): ValidationResult<OwnershipSnapshot> {
  const validate = getSnapshotValidator();

  if (!validate(data)) {
    const errors = validate.errors?.map(
      (e) => `${e.instancePath || 'root'}: ${e.message}`
    ) ?? ['Unknown validation error'];
    return { valid: false, data: null, errors };
  }

  const scaleErrors = checkBracketScale(data);
  if (scaleErrors.length > 0) {
    return { valid: false, data: null, errors: scaleErrors };
  }

  return { valid: true, data, errors: null };
}
