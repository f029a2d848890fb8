import { describe, expect, it } from 'vitest';
import { SimulatedSource, simulateDistribution } from '@/providers/simulated';
import { createSource } from '@/providers/registry';
import { validateSnapshot } from '@/validation/ajv_instance';
import { NoDataError } from '@/core/errors';
import { DEFAULT_FETCH_CONFIG } from '@/core/config';

describe('SimulatedSource', () => {
  it('is deterministic per security and date', async () => {
    const source = new SimulatedSource();
    const a = await source.fetchSnapshot('2330', '2024-01-05');
    const b = await source.fetchSnapshot('2330', '2024-01-05');
    const other = await source.fetchSnapshot('2317', '2024-01-05');

    expect(a).toEqual(b);
    expect(a.brackets).toHaveLength(15);
    expect(a.fetchedAt).toBe('2024-01-05T00:00:00.000Z');
    expect(other.totalShares).not.toBe(a.totalShares);
  });

  it('produces records that pass validation', () => {
    for (const date of ['2024-01-05', '2024-06-14', '2024-12-27']) {
      const result = validateSnapshot(simulateDistribution('2330', date, '2024-01-01T00:00:00.000Z'));
      expect(result.errors).toBeNull();
      expect(result.valid).toBe(true);
    }
  });

  it('answers NoData for configured dates', async () => {
    const source = new SimulatedSource({ noDataDates: ['2024-01-05'] });

    await expect(source.fetchSnapshot('2330', '2024-01-05')).rejects.toBeInstanceOf(NoDataError);
  });

  it('is created by the registry for the simulated kind', () => {
    const source = createSource({ source: 'simulated', tls: { mode: 'always' }, fetch: DEFAULT_FETCH_CONFIG });

    expect(source.name).toBe('simulated');
  });
});
