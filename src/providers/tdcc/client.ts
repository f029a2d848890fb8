/**
 * Depository query-page client.
 * One HTTP attempt per call; pacing and retries are the fetcher's job.
 */

import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import type { TlsPolicy } from '@/core/config';
import { NoDataError, TransientFetchError } from '@/core/errors';
import { createHttpsAgent } from '@/fetch/tls';
import { createChildLogger } from '@/utils/logger';
import type { SnapshotSource } from '@/providers/types';
import type { OwnershipSnapshot, SecurityId, SnapshotDate } from '@/types/snapshot';
import { parseDistributionPage, parseQueryForm, type QueryForm } from './parser';

const logger = createChildLogger('tdcc');

export const TDCC_QUERY_URL = 'https://www.tdcc.com.tw/portal/zh/smWeb/qryStock';

const DEFAULT_HEADERS = {
  'User-Agent':
    'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  'Accept-Language': 'zh-TW,zh;q=0.9,en-US;q=0.8,en;q=0.7',
};

export interface TdccSourceOptions {
  tls: TlsPolicy;
  requestTimeoutMs: number;
  baseUrl?: string;
  /** Replaces the HTTP transport (tests). */
  adapter?: AxiosAdapter;
  now?: () => Date;
}

interface FormState extends QueryForm {
  cookie: string | null;
}

function toCompactDate(date: SnapshotDate): string {
  return date.replace(/-/g, '');
}

export class TdccSource implements SnapshotSource {
  readonly name = 'tdcc';
  private readonly http: AxiosInstance;
  private readonly url: string;
  private readonly now: () => Date;
  private form: Promise<FormState> | null = null;
  private published: Set<SnapshotDate> | null = null;
  private requestCount = 0;

  constructor(options: TdccSourceOptions) {
    this.url = options.baseUrl ?? TDCC_QUERY_URL;
    this.now = options.now ?? (() => new Date());
    this.http = axios.create({
      timeout: options.requestTimeoutMs,
      headers: DEFAULT_HEADERS,
      responseType: 'text',
      httpsAgent: options.adapter ? undefined : createHttpsAgent(options.tls),
      adapter: options.adapter,
    });
  }

  getRequestCount(): number {
    return this.requestCount;
  }

  private async loadForm(signal?: AbortSignal): Promise<FormState> {
    this.requestCount++;
    const response = await this.http.get<string>(this.url, { signal });
    const form = parseQueryForm(response.data);
    const setCookie = response.headers['set-cookie'];
    const cookie = Array.isArray(setCookie)
      ? setCookie.map((entry) => entry.split(';')[0]).join('; ')
      : null;

    logger.debug({ publishedDates: form.publishedDates.length }, 'Loaded query form');
    this.published = form.publishedDates.length > 0 ? new Set(form.publishedDates) : null;
    return { ...form, cookie };
  }

  /** The query form is loaded once and reused until a query comes back malformed. */
  private getForm(signal?: AbortSignal): Promise<FormState> {
    if (!this.form) {
      const pending = this.loadForm(signal);
      this.form = pending;
      pending.catch(() => {
        if (this.form === pending) this.form = null;
      });
    }
    return this.form;
  }

  isKnownUnpublished(date: SnapshotDate): boolean {
    return this.published !== null && !this.published.has(date);
  }

  async listPublishedDates(signal?: AbortSignal): Promise<SnapshotDate[]> {
    const form = await this.getForm(signal);
    return [...form.publishedDates];
  }

  async fetchSnapshot(security: SecurityId, date: SnapshotDate, signal?: AbortSignal): Promise<OwnershipSnapshot> {
    const form = await this.getForm(signal);
    if (form.publishedDates.length > 0 && !form.publishedDates.includes(date)) {
      throw new NoDataError(`${date} is not a published record date`);
    }

    const body = new URLSearchParams({
      ...form.hiddenFields,
      scaDate: toCompactDate(date),
      sqlMethod: 'StockNo',
      stockNo: security,
      stockName: '',
    });

    this.requestCount++;
    const response = await this.http.post<string>(this.url, body.toString(), {
      signal,
      headers: {
        'Content-Type': 'application/x-www-form-urlencoded',
        ...(form.cookie ? { Cookie: form.cookie } : {}),
      },
    });

    try {
      return parseDistributionPage(response.data, {
        security,
        date,
        fetchedAt: this.now().toISOString(),
        source: this.name,
      });
    } catch (error) {
      if (error instanceof TransientFetchError) {
        // A stale form token yields the bare form again; reload it next time.
        this.form = null;
      }
      throw error;
    }
  }
}
