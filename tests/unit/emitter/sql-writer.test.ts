/**
 * SQL dump writer tests
 */

import { describe, it, expect } from 'vitest';
import { Readable } from 'stream';
import {
  FOOTER,
  createSqlDumpWriter,
  renderDump,
  renderHeader,
  renderTableBlock,
} from '../../../src/lib/emitter/sql-writer.js';
import type { TableBlock } from '../../../src/lib/generator/types.js';
import { GenerationError } from '../../../src/utils/errors.js';

const companies: TableBlock = {
  table: 'companies',
  columns: ['id', 'name'],
  rows: [
    [
      { kind: 'number', value: '1' },
      { kind: 'text', value: 'Acme' },
    ],
    [
      { kind: 'number', value: '2' },
      { kind: 'text', value: "Bob's Burgers" },
    ],
  ],
};

const empty: TableBlock = { table: 'audit_log', columns: ['id'], rows: [] };

async function pipeThroughWriter(chunks: unknown[], header?: string[]): Promise<string> {
  const writer = createSqlDumpWriter({ header });
  const output: string[] = [];

  writer.on('data', (chunk: Buffer | string) => {
    output.push(chunk.toString());
  });

  await new Promise<void>((resolve, reject) => {
    writer.on('end', resolve);
    writer.on('error', reject);
    Readable.from(chunks, { objectMode: true }).pipe(writer);
  });

  return output.join('');
}

describe('renderHeader', () => {
  it('should write comments, BEGIN and deferred constraints', () => {
    expect(renderHeader(['Generated dump', 'Seed: 1'])).toBe(
      '-- Generated dump\n-- Seed: 1\nBEGIN;\nSET CONSTRAINTS ALL DEFERRED;\n',
    );
  });

  it('should work without comments', () => {
    expect(renderHeader([])).toBe('BEGIN;\nSET CONSTRAINTS ALL DEFERRED;\n');
  });
});

describe('renderTableBlock', () => {
  it('should render one INSERT with a tuple per row', () => {
    const block: TableBlock = {
      table: 't',
      columns: ['a', 'b'],
      rows: [
        [
          { kind: 'number', value: '1' },
          { kind: 'text', value: 'x' },
        ],
        [{ kind: 'number', value: '2' }, { kind: 'null' }],
      ],
    };

    expect(renderTableBlock(block)).toBe("\n-- Data for t\nINSERT INTO t (a, b) VALUES\n(1, 'x'),\n(2, NULL);\n");
  });

  it('should separate three rows with two commas and end with a semicolon', () => {
    const block: TableBlock = {
      table: 'n',
      columns: ['v'],
      rows: [[{ kind: 'number', value: '1' }], [{ kind: 'number', value: '2' }], [{ kind: 'number', value: '3' }]],
    };

    expect(renderTableBlock(block)).toBe('\n-- Data for n\nINSERT INTO n (v) VALUES\n(1),\n(2),\n(3);\n');
  });

  it('should quote reserved table and column names', () => {
    const block: TableBlock = {
      table: 'user',
      columns: ['id', 'order'],
      rows: [[{ kind: 'number', value: '1' }, { kind: 'boolean', value: true }]],
    };

    expect(renderTableBlock(block)).toBe('\n-- Data for user\nINSERT INTO "user" (id, "order") VALUES\n(1, true);\n');
  });

  it('should keep only the comment for a table without rows', () => {
    expect(renderTableBlock(empty)).toBe('\n-- Data for audit_log\n');
  });
});

describe('renderDump', () => {
  it('should wrap every block in a single transaction', () => {
    const dump = renderDump([companies, empty], { header: ['test'] });

    expect(dump).toBe(
      [
        '-- test',
        'BEGIN;',
        'SET CONSTRAINTS ALL DEFERRED;',
        '',
        '-- Data for companies',
        'INSERT INTO companies (id, name) VALUES',
        "(1, 'Acme'),",
        "(2, 'Bob''s Burgers');",
        '',
        '-- Data for audit_log',
        '',
        'COMMIT;',
        '',
      ].join('\n'),
    );
  });
});

describe('SqlDumpWriter', () => {
  it('should produce the same text as renderDump when streamed', async () => {
    const text = await pipeThroughWriter([companies, empty], ['Generated dump']);

    expect(text).toBe(renderDump([companies, empty], { header: ['Generated dump'] }));
  });

  it('should write header and footer for an empty stream', async () => {
    const text = await pipeThroughWriter([]);

    expect(text).toBe(`BEGIN;\nSET CONSTRAINTS ALL DEFERRED;\n${FOOTER}`);
  });

  it('should count tables and rows written', async () => {
    const writer = createSqlDumpWriter();
    writer.resume();

    await new Promise<void>((resolve, reject) => {
      writer.on('end', resolve);
      writer.on('error', reject);
      Readable.from([companies, empty], { objectMode: true }).pipe(writer);
    });

    expect(writer.tablesWritten).toBe(2);
    expect(writer.rowsWritten).toBe(2);
  });

  it('should fail on chunks that are not table blocks', async () => {
    await expect(pipeThroughWriter([{ rows: 'nope' }])).rejects.toBeInstanceOf(GenerationError);
  });
});
