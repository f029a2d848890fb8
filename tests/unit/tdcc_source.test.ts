import { describe, expect, it } from 'vitest';
import type { AxiosAdapter, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { parseCount, parseDistributionPage, parseQueryForm } from '@/providers/tdcc/parser';
import { TdccSource } from '@/providers/tdcc/client';
import { NoDataError, TransientFetchError } from '@/core/errors';
import { DISTRIBUTION_BRACKET_LABELS } from '@/providers/brackets';

const FORM_HTML = `
<html><body>
  <form id="form1" method="post">
    <input type="hidden" name="SYNCHRONIZER_TOKEN" value="test-token" />
    <select id="scaDate" name="scaDate">
      <option value="">請選擇</option>
      <option value="20240112">20240112</option>
      <option value="20240105">20240105</option>
    </select>
    <input type="text" name="stockNo" />
  </form>
</body></html>`;

function resultHtml(): string {
  const tiers = DISTRIBUTION_BRACKET_LABELS.map((label, index) => {
    const id = index + 1;
    return `<tr><td>${id}</td><td>${label}</td><td>${(100 - id).toLocaleString('en-US')}</td><td>${(id * 1000).toLocaleString('en-US')}</td><td>1.00</td></tr>`;
  }).join('\n');
  return `
<html><body>
  <table class="table"><tr><td>證券代號：2330</td></tr></table>
  <table class="table">
    <tr><th>序</th><th>持股/單位數分級</th><th>人數</th><th>股數/單位數</th><th>占集保庫存數比例 (%)</th></tr>
    ${tiers}
    <tr><td>16</td><td>差異數調整（說明4）</td><td>0</td><td>0</td><td>0.00</td></tr>
    <tr><td>17</td><td>合計</td><td>1,380</td><td>150,000</td><td>100.00</td></tr>
  </table>
</body></html>`;
}

const NO_DATA_HTML = '<html><body><p>查無此資料</p></body></html>';

describe('TDCC parser', () => {
  it('reads published dates and hidden fields from the query form', () => {
    expect(parseQueryForm(FORM_HTML)).toEqual({
      publishedDates: ['2024-01-05', '2024-01-12'],
      hiddenFields: { SYNCHRONIZER_TOKEN: 'test-token' },
    });
  });

  it('parses counts with thousands separators', () => {
    expect(parseCount('1,234,567')).toBe(1234567);
    expect(parseCount(' 42 ')).toBe(42);
    expect(parseCount('n/a')).toBeNull();
  });

  it('turns the distribution table into a snapshot', () => {
    const snapshot = parseDistributionPage(resultHtml(), {
      security: '2330',
      date: '2024-01-05',
      fetchedAt: '2024-01-08T00:00:00.000Z',
    });

    expect(snapshot.brackets).toHaveLength(15);
    expect(snapshot.brackets[0]).toEqual({ bracketId: 1, label: '1-999', holderCount: 99, shareCount: 1000 });
    expect(snapshot.brackets[14]).toEqual({
      bracketId: 15,
      label: '1,000,001+',
      holderCount: 85,
      shareCount: 15000,
    });
    expect(snapshot.totalShares).toBe(150000);
    expect(snapshot.totalHolders).toBe(1380);
    expect(snapshot.source).toBe('tdcc');
  });

  it('maps the no-data page to NoDataError', () => {
    expect(() =>
      parseDistributionPage(NO_DATA_HTML, { security: '2330', date: '2024-01-05', fetchedAt: '2024-01-08T00:00:00Z' })
    ).toThrow(NoDataError);
  });

  it('treats a page without the table as a transient failure', () => {
    expect(() =>
      parseDistributionPage(FORM_HTML, { security: '2330', date: '2024-01-05', fetchedAt: '2024-01-08T00:00:00Z' })
    ).toThrow(TransientFetchError);
  });
});

interface RecordedRequest {
  method: string | undefined;
  data: unknown;
  cookie: unknown;
}

function createAdapter(postBody: string, requests: RecordedRequest[]): AxiosAdapter {
  return async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
    requests.push({ method: config.method, data: config.data, cookie: config.headers.get('Cookie') });
    const isGet = config.method === 'get';
    return {
      data: isGet ? FORM_HTML : postBody,
      status: 200,
      statusText: 'OK',
      headers: isGet ? { 'set-cookie': ['JSESSIONID=test-session; Path=/'] } : {},
      config,
    };
  };
}

describe('TdccSource', () => {
  it('loads the form once and posts the query for a published date', async () => {
    const requests: RecordedRequest[] = [];
    const source = new TdccSource({
      tls: { mode: 'always' },
      requestTimeoutMs: 1000,
      adapter: createAdapter(resultHtml(), requests),
      now: () => new Date('2024-01-08T00:00:00.000Z'),
    });

    const first = await source.fetchSnapshot('2330', '2024-01-05');
    await source.fetchSnapshot('2330', '2024-01-12');

    expect(first.fetchedAt).toBe('2024-01-08T00:00:00.000Z');
    expect(requests.map((r) => r.method)).toEqual(['get', 'post', 'post']);
    expect(requests[1].cookie).toBe('JSESSIONID=test-session');
    const body = new URLSearchParams(String(requests[1].data));
    expect(body.get('scaDate')).toBe('20240105');
    expect(body.get('sqlMethod')).toBe('StockNo');
    expect(body.get('stockNo')).toBe('2330');
    expect(body.get('SYNCHRONIZER_TOKEN')).toBe('test-token');
    expect(source.getRequestCount()).toBe(3);
  });

  it('answers NoData for a date that is not published without querying', async () => {
    const requests: RecordedRequest[] = [];
    const source = new TdccSource({
      tls: { mode: 'always' },
      requestTimeoutMs: 1000,
      adapter: createAdapter(resultHtml(), requests),
    });

    expect(source.isKnownUnpublished('2024-01-19')).toBe(false);
    await expect(source.fetchSnapshot('2330', '2024-01-19')).rejects.toBeInstanceOf(NoDataError);
    expect(requests.map((r) => r.method)).toEqual(['get']);
    expect(source.isKnownUnpublished('2024-01-19')).toBe(true);
    expect(source.isKnownUnpublished('2024-01-05')).toBe(false);
    expect(await source.listPublishedDates()).toEqual(['2024-01-05', '2024-01-12']);
  });

  it('reloads the form after a malformed result page', async () => {
    const requests: RecordedRequest[] = [];
    const source = new TdccSource({
      tls: { mode: 'always' },
      requestTimeoutMs: 1000,
      adapter: createAdapter(FORM_HTML, requests),
    });

    await expect(source.fetchSnapshot('2330', '2024-01-05')).rejects.toBeInstanceOf(TransientFetchError);
    await expect(source.fetchSnapshot('2330', '2024-01-05')).rejects.toBeInstanceOf(TransientFetchError);
    expect(requests.map((r) => r.method)).toEqual(['get', 'post', 'get', 'post']);
  });
});
