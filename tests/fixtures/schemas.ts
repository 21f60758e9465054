import { parseDataType } from '../../src/lib/schema/type-parser.js';
import type { Column, ForeignKey, Table } from '../../src/types/schema-model.js';

export const FIXED_NOW = new Date('2024-06-15T12:00:00Z');
export const TEST_SEED = 'test-seed';

export function column(
  name: string,
  type = 'text',
  extra: { nullable?: boolean; samples?: string[] } = {},
): Column {
  const result: Column = { name, dataType: parseDataType(type), nullable: extra.nullable ?? true };
  if (extra.samples) {
    result.samples = extra.samples;
  }
  return result;
}

export function fk(columnName: string, referencedTable: string, referencedColumn = 'id'): ForeignKey {
  return { column: columnName, referencedTable, referencedColumn };
}

export function table(
  name: string,
  columns: Column[],
  foreignKeys: ForeignKey[] = [],
  primaryKey?: string[],
): Table {
  const result: Table = { name, columns, foreignKeys };
  if (primaryKey) {
    result.primaryKey = primaryKey;
  }
  return result;
}

/**
 * companies(id, name) <- employees(id, company_id, email)
 */
export function companiesAndEmployees(): Table[] {
  return [
    table('companies', [column('id', 'integer', { nullable: false }), column('name')]),
    table(
      'employees',
      [column('id', 'integer', { nullable: false }), column('company_id', 'integer'), column('email')],
      [fk('company_id', 'companies')],
    ),
  ];
}
