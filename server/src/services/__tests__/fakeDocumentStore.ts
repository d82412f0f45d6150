import { StoreQueryError } from '../../errors';
import type { DocumentStore, QueryOptions, QueryResult, Row, TableHandle } from '../documentStore';

function compareValues(left: unknown, right: unknown): number {
  const leftMissing = left === null || left === undefined;
  const rightMissing = right === null || right === undefined;
  if (leftMissing || rightMissing) {
    return Number(leftMissing) - Number(rightMissing);
  }
  if (typeof left === 'number' && typeof right === 'number') {
    return left - right;
  }
  const a = String(left);
  const b = String(right);
  if (a < b) {
    return -1;
  }
  return a > b ? 1 : 0;
}

function matches(row: Row, options: QueryOptions): boolean {
  const equalsOk = Object.entries(options.equals ?? {}).every(([column, value]) => row[column] === value);
  const withinOk = Object.entries(options.within ?? {}).every(([column, values]) =>
    values.some((value) => row[column] === value),
  );
  const excludingOk = Object.entries(options.excluding ?? {}).every(([column, values]) => {
    const value = row[column];
    return value !== null && value !== undefined && !values.some((excluded) => value === excluded);
  });
  const containsOk = Object.entries(options.contains ?? {}).every(([column, values]) => {
    const value = row[column];
    return Array.isArray(value) && values.every((expected) => value.includes(expected));
  });
  const search = options.search;
  const searchOk =
    !search ||
    search.columns.some((column) => {
      const value = row[column];
      return typeof value === 'string' && value.toLowerCase().includes(search.term.toLowerCase());
    });
  return equalsOk && withinOk && excludingOk && containsOk && searchOk;
}

/** In-process stand-in for the Supabase-backed store. */
export class FakeDocumentStore implements DocumentStore {
  readonly tables = new Map<string, Row[]>();
  readonly queries: Array<{ table: string; options: QueryOptions }> = [];
  readonly failingTables = new Set<string>();
  insertError: unknown = null;

  constructor(seed: Record<string, Row[]> = {}) {
    Object.entries(seed).forEach(([table, rows]) => {
      this.tables.set(table, rows.map((row) => ({ ...row })));
    });
  }

  rows(table: string): Row[] {
    return this.tables.get(table) ?? [];
  }

  openTable(name: string): TableHandle {
    return {
      name,
      query: async (options: QueryOptions = {}): Promise<QueryResult> => {
        this.queries.push({ table: name, options });
        if (this.failingTables.has(name)) {
          throw new StoreQueryError(name, 'connection refused');
        }

        let rows = this.rows(name).filter((row) => matches(row, options));
        const orderBy = options.orderBy ?? [];
        if (orderBy.length > 0) {
          rows = [...rows].sort((a, b) => {
            for (const term of orderBy) {
              const result = compareValues(a[term.column], b[term.column]);
              if (result !== 0) {
                return term.ascending ? result : -result;
              }
            }
            return 0;
          });
        }

        const total = rows.length;
        if (options.range) {
          rows = rows.slice(options.range.offset, options.range.offset + options.range.limit);
        } else if (typeof options.limit === 'number') {
          rows = rows.slice(0, options.limit);
        }

        const columns = options.columns;
        const projected = columns?.length
          ? rows.map((row) => Object.fromEntries(columns.filter((c) => c in row).map((c) => [c, row[c]])))
          : rows.map((row) => ({ ...row }));

        return { rows: projected, count: options.count ? total : null };
      },
      insert: async (row: Row): Promise<void> => {
        if (this.insertError !== null) {
          throw this.insertError;
        }
        const rows = this.tables.get(name) ?? [];
        rows.push({ ...row });
        this.tables.set(name, rows);
      },
    };
  }
}
