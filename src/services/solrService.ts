import { z } from 'zod';
import type { IndexRecord, RawFlagValue } from '../types/job.js';
import type { SolrConfig } from '../utils/config.js';
import type { IndexLookup } from '../verifier/syncVerifier.js';
import { SolrRequestError } from '../verifier/errors.js';
import { parseSkillList } from '../verifier/normalizer.js';
import { withRetry } from '../utils/retry.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger(import.meta.url);

const scalar = z.union([z.string(), z.number(), z.boolean()]);
const fieldValue = z.union([scalar, z.array(scalar)]).nullable().optional();

export const SolrDocSchema = z
  .object({
    id: z.union([z.string(), z.number()]).transform(String),
    title: fieldValue,
    company_name: fieldValue,
    city_name: fieldValue,
    state_name: fieldValue,
    workmode: fieldValue,
    remote: fieldValue,
    joblink: fieldValue,
    ai_skills: fieldValue,
  })
  .passthrough();

export type SolrDoc = z.infer<typeof SolrDocSchema>;

const SelectResponseSchema = z.object({
  response: z.object({
    numFound: z.number(),
    docs: z.array(SolrDocSchema),
  }),
});

const PingResponseSchema = z.object({
  status: z.string(),
});

type FieldValue = z.infer<typeof fieldValue>;

function firstValue(value: FieldValue): RawFlagValue {
  if (value === undefined || value === null) return null;
  if (Array.isArray(value)) return value.length > 0 ? value[0] : null;
  return value;
}

function firstString(value: FieldValue): string | null {
  const first = firstValue(value);
  if (first === null) return null;
  const text = String(first);
  return text.trim() === '' || text === 'N/A' || text === 'null' ? null : text;
}

function skillList(value: FieldValue): string[] {
  if (value === undefined || value === null) return [];
  if (Array.isArray(value)) return value.map(String);
  return parseSkillList(String(value));
}

/**
 * Turns a validated Solr document into an {@link IndexRecord}. Multi-valued
 * fields keep their first value, except the skills list.
 */
export function toIndexRecord(doc: SolrDoc): IndexRecord {
  return {
    id: doc.id,
    title: firstString(doc.title),
    company_name: firstString(doc.company_name),
    city_name: firstString(doc.city_name),
    state_name: firstString(doc.state_name),
    workmode: firstValue(doc.workmode),
    remote: firstValue(doc.remote),
    ai_skills: skillList(doc.ai_skills),
    job_link: firstString(doc.joblink),
  };
}

export function buildIdQuery(ids: readonly string[]): string {
  const terms = ids.map((id) => `"${id.replace(/(["\\])/g, '\\$1')}"`);
  return `id:(${terms.join(' OR ')})`;
}

export type SolrServiceConfig = Omit<SolrConfig, 'url'> & { url: string };

export class SolrService implements IndexLookup {
  private baseUrl: string;
  private authHeader: string | null;

  constructor(private config: SolrServiceConfig) {
    this.baseUrl = config.url.replace(/\/+$/, '');
    this.authHeader = config.user
      ? `Basic ${Buffer.from(`${config.user}:${config.password}`).toString('base64')}`
      : null;
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (this.authHeader) {
      headers.Authorization = this.authHeader;
    }
    return headers;
  }

  private async request(path: string, init: { method?: string; body?: string; headers?: Record<string, string> } = {}): Promise<unknown> {
    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}${path}`, {
        method: init.method ?? 'GET',
        body: init.body,
        headers: { ...this.headers(), ...init.headers },
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new SolrRequestError(`Solr request to ${path} failed: ${reason}`);
    }

    if (!response.ok) {
      throw new SolrRequestError(`Solr request to ${path} failed with HTTP ${response.status}`, response.status);
    }

    try {
      return await response.json();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new SolrRequestError(`Solr request to ${path} returned a body that is not JSON: ${reason}`);
    }
  }

  /**
   * Checks that the core answers its ping handler.
   */
  async ping(): Promise<boolean> {
    try {
      const body = PingResponseSchema.parse(await this.request('/admin/ping?wt=json'));
      return body.status === 'OK';
    } catch (error) {
      logger.warn({ err: error }, 'Solr ping failed');
      return false;
    }
  }

  /**
   * Fetches the documents of one batch of ids, retrying transient failures.
   */
  async searchByIds(ids: readonly string[]): Promise<SolrDoc[]> {
    if (ids.length === 0) return [];

    const body = new URLSearchParams({
      q: buildIdQuery(ids),
      rows: String(ids.length),
      wt: 'json',
    });

    const raw = await withRetry(
      () =>
        this.request('/select', {
          method: 'POST',
          headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
          body: body.toString(),
        }),
      {
        attempts: this.config.maxRetries,
        baseDelayMs: this.config.retryDelayMs,
        shouldRetry: (error) => error instanceof SolrRequestError && error.retryable,
        onRetry: (error, attempt, delayMs) => {
          logger.warn({ err: error, attempt, delayMs }, 'Solr query failed, retrying');
        },
      },
    );

    const parsed = SelectResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new SolrRequestError(`Unexpected Solr response: ${parsed.error.message}`);
    }
    return parsed.data.response.docs;
  }

  async fetchByIds(ids: readonly string[]): Promise<Map<string, IndexRecord>> {
    const records = new Map<string, IndexRecord>();
    const batchSize = this.config.batchSize;

    for (let start = 0; start < ids.length; start += batchSize) {
      const batch = ids.slice(start, start + batchSize);
      const docs = await this.searchByIds(batch);
      for (const doc of docs) {
        records.set(doc.id, toIndexRecord(doc));
      }
      logger.debug({ batchStart: start, requested: batch.length, found: docs.length }, 'Fetched index batch');
    }

    return records;
  }
}
