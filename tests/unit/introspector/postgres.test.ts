import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  PostgresIntrospector,
  introspectPostgres,
  isSampleCandidate,
  quoteName,
  type QueryClient,
} from '../../../src/lib/introspector/index.js';
import { IntrospectionError } from '../../../src/utils/errors.js';
import { logger } from '../../../src/utils/logger.js';

type Row = Record<string, unknown>;

interface FakeTable {
  columns: Row[];
  primaryKey?: string[];
  foreignKeys?: Row[];
}

/**
 * In-process stand-in for the catalog: answers the introspection queries from fixed rows
 */
class FakeCatalog implements QueryClient {
  readonly queries: { text: string; values?: readonly unknown[] }[] = [];

  constructor(
    private tables: Record<string, FakeTable>,
    private samples: Record<string, string[] | Error> = {},
  ) {}

  async query(text: string, values?: readonly unknown[]): Promise<{ rows: unknown[] }> {
    this.queries.push({ text, values });
    const tableName = String(values?.[1]);

    if (text.includes('information_schema.tables')) {
      return { rows: Object.keys(this.tables).map((table_name) => ({ table_name })) };
    }
    if (text.includes('information_schema.columns')) {
      return { rows: this.tables[tableName]?.columns ?? [] };
    }
    if (text.includes("'PRIMARY KEY'")) {
      return { rows: (this.tables[tableName]?.primaryKey ?? []).map((column_name) => ({ column_name })) };
    }
    if (text.includes("'FOREIGN KEY'")) {
      return { rows: this.tables[tableName]?.foreignKeys ?? [] };
    }

    const match = /FROM "public"\."(\w+)" WHERE "(\w+)"/.exec(text);
    const sampled = match ? this.samples[`${match[1]}.${match[2]}`] : undefined;
    if (sampled instanceof Error) throw sampled;
    return { rows: (sampled ?? []).map((value) => ({ value })) };
  }
}

const columnRow = (column_name: string, data_type: string, extra: Row = {}): Row => ({
  column_name,
  data_type,
  is_nullable: 'YES',
  numeric_precision: null,
  numeric_scale: null,
  character_maximum_length: null,
  ...extra,
});

function catalog(samples: Record<string, string[] | Error> = {}): FakeCatalog {
  return new FakeCatalog(
    {
      companies: {
        columns: [
          columnRow('id', 'integer', { is_nullable: 'NO', numeric_precision: 32, numeric_scale: 0 }),
          columnRow('name', 'text'),
          columnRow('status', 'character varying', { character_maximum_length: 20 }),
        ],
        primaryKey: ['id'],
      },
      employees: {
        columns: [
          columnRow('id', 'integer', { is_nullable: 'NO' }),
          columnRow('company_id', 'integer'),
          columnRow('salary', 'numeric', { numeric_precision: 10, numeric_scale: 2 }),
          columnRow('level', 'text'),
        ],
        primaryKey: ['id'],
        foreignKeys: [{ column_name: 'company_id', foreign_table_name: 'companies', foreign_column_name: 'id' }],
      },
    },
    samples,
  );
}

describe('PostgresIntrospector', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('reads tables, columns and keys from the catalog', async () => {
    const [companies, employees] = await introspectPostgres(catalog({ 'companies.status': ['active', 'closed'] }));

    expect(companies).toEqual({
      name: 'companies',
      primaryKey: ['id'],
      foreignKeys: [],
      columns: [
        { name: 'id', dataType: { tag: 'integer', raw: 'integer' }, nullable: false },
        { name: 'name', dataType: { tag: 'text', raw: 'text' }, nullable: true },
        {
          name: 'status',
          dataType: { tag: 'varchar', raw: 'character varying', length: 20 },
          nullable: true,
          samples: ['active', 'closed'],
        },
      ],
    });
    expect(employees.foreignKeys).toEqual([{ column: 'company_id', referencedTable: 'companies', referencedColumn: 'id' }]);
    expect(employees.columns[2].dataType).toEqual({ tag: 'decimal', raw: 'numeric', precision: 10, scale: 2 });
  });

  it('samples eligible text columns with a bounded distinct query', async () => {
    const client = catalog();
    await new PostgresIntrospector(client, { sampleLimit: 5 }).introspect();

    const sampling = client.queries.filter((query) => query.text.startsWith('SELECT DISTINCT'));
    expect(sampling).toEqual([
      {
        text: 'SELECT DISTINCT "status" AS value FROM "public"."companies" WHERE "status" IS NOT NULL LIMIT $1',
        values: [5],
      },
      {
        text: 'SELECT DISTINCT "level" AS value FROM "public"."employees" WHERE "level" IS NOT NULL LIMIT $1',
        values: [5],
      },
    ]);
  });

  it('skips sampling when the limit is zero', async () => {
    const client = catalog({ 'companies.status': ['active'] });
    const [companies] = await new PostgresIntrospector(client, { sampleLimit: 0 }).introspect();

    expect(client.queries.some((query) => query.text.startsWith('SELECT DISTINCT'))).toBe(false);
    expect(companies.columns[2].samples).toBeUndefined();
  });

  it('keeps going when a sample query fails', async () => {
    const warn = vi.spyOn(logger, 'warn').mockImplementation(() => undefined);
    const [, employees] = await introspectPostgres(catalog({ 'employees.level': new Error('permission denied') }));

    expect(employees.columns[3].samples).toBeUndefined();
    expect(warn).toHaveBeenCalledWith('Sampling failed; column will be synthesized', {
      table: 'employees',
      column: 'level',
      reason: 'permission denied',
    });
  });

  it('passes the schema name to every catalog query', async () => {
    const client = catalog();
    await new PostgresIntrospector(client, { schemaName: 'sales', sampleLimit: 0 }).introspect();

    expect(client.queries.every((query) => query.values?.[0] === 'sales')).toBe(true);
  });

  it('wraps catalog failures', async () => {
    const client: QueryClient = {
      query: async () => {
        throw new Error('connection reset');
      },
    };

    await expect(introspectPostgres(client)).rejects.toThrow(IntrospectionError);
    await expect(introspectPostgres(client)).rejects.toThrow('Catalog query failed');
  });

  it('rejects malformed catalog rows', async () => {
    const client = new FakeCatalog({ broken: { columns: [{ column_name: 'id' }] } });

    await expect(introspectPostgres(client)).rejects.toThrow('Catalog row is missing "data_type"');
  });
});

describe('isSampleCandidate', () => {
  it.each([
    ['status', 'text', true],
    ['level', 'character varying', true],
    ['code', 'character', true],
    ['customer_id', 'text', false],
    ['email', 'text', false],
    ['display_name', 'character varying', false],
    ['amount', 'integer', false],
  ])('%s (%s) -> %s', (name, type, expected) => {
    expect(isSampleCandidate(name, type)).toBe(expected);
  });
});

describe('quoteName', () => {
  it('always double-quotes and escapes embedded quotes', () => {
    expect(quoteName('users')).toBe('"users"');
    expect(quoteName('odd"name')).toBe('"odd""name"');
  });
});
