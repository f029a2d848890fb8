import { describe, expect, it } from 'vitest';
import { checkBracketScale, validateSnapshot } from '@/validation/ajv_instance';
import { makeSnapshot } from '../helpers/snapshots';

describe('validateSnapshot', () => {
  it('accepts a well-formed snapshot', () => {
    const result = validateSnapshot(makeSnapshot('2330', '2024-01-05'));

    expect(result.valid).toBe(true);
    expect(result.errors).toBeNull();
    expect(result.data?.totalShares).toBe(10_000);
  });

  it('reports schema errors with their paths', () => {
    const result = validateSnapshot({ ...makeSnapshot('2330', '2024-01-05'), totalShares: 0 });

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual(['/totalShares: must be > 0']);
  });

  it('rejects unknown fields', () => {
    const result = validateSnapshot({ ...makeSnapshot('2330', '2024-01-05'), price: 600 });

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual(['root: must NOT have additional properties']);
  });
});

describe('checkBracketScale', () => {
  it('requires contiguous bracket ids', () => {
    const snapshot = makeSnapshot('2330', '2024-01-05');
    snapshot.brackets[1] = { ...snapshot.brackets[1], bracketId: 3 };

    expect(checkBracketScale(snapshot)).toEqual(['/brackets/1: expected bracketId 2, got 3']);
  });

  it('requires empty tiers to hold no shares', () => {
    const snapshot = makeSnapshot('2330', '2024-01-05');
    snapshot.brackets[0] = { ...snapshot.brackets[0], holderCount: 0 };

    expect(checkBracketScale(snapshot)).toEqual(['/brackets/0: shareCount must be 0 when holderCount is 0']);
  });

  it('rejects tiers that add up to more than the total', () => {
    const snapshot = makeSnapshot('2330', '2024-01-05', { totalShares: 9_000 });

    expect(checkBracketScale(snapshot)).toEqual(['/brackets: share sum 10000 exceeds totalShares 9000']);
    expect(validateSnapshot(snapshot).valid).toBe(false);
  });
});
