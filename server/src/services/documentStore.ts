import type { SupabaseClient } from '@supabase/supabase-js';
import { StoreQueryError, StoreTimeoutError, describeError } from '../errors';

export type Row = Record<string, unknown>;

export type FieldValue = string | number | boolean;

export interface OrderTerm {
  column: string;
  ascending: boolean;
}

export interface TextSearch {
  columns: readonly string[];
  term: string;
}

export interface QueryOptions {
  columns?: readonly string[];
  equals?: Readonly<Record<string, FieldValue>>;
  within?: Readonly<Record<string, readonly FieldValue[]>>;
  /** Column must be set and hold none of the values; `null` never matches. */
  excluding?: Readonly<Record<string, readonly FieldValue[]>>;
  /** Array column must contain every value. */
  contains?: Readonly<Record<string, readonly FieldValue[]>>;
  search?: TextSearch;
  orderBy?: readonly OrderTerm[];
  range?: { offset: number; limit: number };
  limit?: number;
  count?: boolean;
}

export interface QueryResult {
  rows: Row[];
  /** Total number of matching rows, or `null` when the count was not requested. */
  count: number | null;
}

export interface TableHandle {
  readonly name: string;
  query(options?: QueryOptions): Promise<QueryResult>;
  insert(row: Row): Promise<void>;
}

export interface DocumentStore {
  openTable(name: string): TableHandle;
}

export function isRow(value: unknown): value is Row {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// PostgREST treats these as syntax inside an `or=(...)` filter.
function sanitiseSearchTerm(term: string): string {
  return term.replace(/[,()"'\\%*]/g, ' ').trim();
}

function formatInList(values: readonly FieldValue[]): string {
  const formatted = values.map((value) => {
    const text = String(value);
    return /[,()]/.test(text) ? `"${text}"` : text;
  });
  return `(${formatted.join(',')})`;
}

export interface SupabaseDocumentStoreOptions {
  client: SupabaseClient;
  timeoutMs: number;
}

class SupabaseTableHandle implements TableHandle {
  constructor(
    readonly name: string,
    private readonly client: SupabaseClient,
    private readonly timeoutMs: number,
  ) {}

  async query(options: QueryOptions = {}): Promise<QueryResult> {
    const signal = AbortSignal.timeout(this.timeoutMs);
    const columns = options.columns?.length ? options.columns.join(', ') : '*';

    let query = this.client
      .from(this.name)
      .select(columns, options.count ? { count: 'exact' } : undefined)
      .abortSignal(signal);

    Object.entries(options.equals ?? {}).forEach(([column, value]) => {
      query = query.eq(column, value);
    });

    Object.entries(options.within ?? {}).forEach(([column, values]) => {
      query = query.in(column, [...values]);
    });

    Object.entries(options.excluding ?? {}).forEach(([column, values]) => {
      query = query.not(column, 'in', formatInList(values));
    });

    Object.entries(options.contains ?? {}).forEach(([column, values]) => {
      query = query.contains(column, [...values]);
    });

    if (options.search) {
      const term = sanitiseSearchTerm(options.search.term);
      if (term) {
        query = query.or(
          options.search.columns.map((column) => `${column}.ilike.%${term}%`).join(','),
        );
      }
    }

    (options.orderBy ?? []).forEach((term) => {
      query = query.order(term.column, { ascending: term.ascending });
    });

    if (options.range) {
      const { offset, limit } = options.range;
      query = query.range(offset, offset + limit - 1);
    } else if (typeof options.limit === 'number') {
      query = query.limit(options.limit);
    }

    let response: Awaited<typeof query>;
    try {
      response = await query;
    } catch (error) {
      throw this.toStoreError(signal, error);
    }

    if (response.error) {
      throw this.toStoreError(signal, response.error);
    }

    const data: unknown = response.data;
    const rows = Array.isArray(data) ? data.filter(isRow) : [];
    return { rows, count: options.count ? response.count ?? rows.length : null };
  }

  async insert(row: Row): Promise<void> {
    const signal = AbortSignal.timeout(this.timeoutMs);
    let error: unknown;
    try {
      ({ error } = await this.client.from(this.name).insert(row).abortSignal(signal));
    } catch (caught) {
      throw this.toStoreError(signal, caught);
    }

    if (error) {
      throw this.toStoreError(signal, error);
    }
  }

  private toStoreError(signal: AbortSignal, cause: unknown): StoreQueryError {
    if (signal.aborted) {
      return new StoreTimeoutError(this.name, this.timeoutMs, { cause });
    }
    return new StoreQueryError(this.name, describeError(cause), { cause });
  }
}

/**
 * Document store backed by Supabase tables. Every call carries its own
 * timeout signal.
 */
export class SupabaseDocumentStore implements DocumentStore {
  private readonly client: SupabaseClient;
  private readonly timeoutMs: number;

  constructor(options: SupabaseDocumentStoreOptions) {
    this.client = options.client;
    this.timeoutMs = options.timeoutMs;
  }

  openTable(name: string): TableHandle {
    return new SupabaseTableHandle(name, this.client, this.timeoutMs);
  }
}
