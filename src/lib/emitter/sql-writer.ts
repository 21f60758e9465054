/**
 * SQL dump writer - Transform stream that turns table blocks into one transactional INSERT script
 */

import { Transform, type TransformCallback } from "stream";
import type { TableBlock } from "../generator/types.js";
import { GenerationError } from "../../utils/errors.js";
import { quoteIdentifier, renderLiteral } from "./sql-literal.js";
import type { SqlDumpWriterOptions } from "./types.js";

function isTableBlock(chunk: unknown): chunk is TableBlock {
  if (typeof chunk !== "object" || chunk === null) return false;
  return (
    "table" in chunk &&
    typeof chunk.table === "string" &&
    "columns" in chunk &&
    Array.isArray(chunk.columns) &&
    "rows" in chunk &&
    Array.isArray(chunk.rows)
  );
}

export function renderHeader(lines: readonly string[]): string {
  const comments = lines.map((line) => `-- ${line}\n`).join("");
  return `${comments}BEGIN;\nSET CONSTRAINTS ALL DEFERRED;\n`;
}

/**
 * One INSERT per table, one tuple per row. A block without rows or columns keeps only its comment.
 */
export function renderTableBlock(block: TableBlock): string {
  const comment = `\n-- Data for ${block.table}\n`;
  if (block.rows.length === 0 || block.columns.length === 0) {
    return comment;
  }

  const columns = block.columns.map(quoteIdentifier).join(", ");
  const tuples = block.rows.map((row) => `(${row.map(renderLiteral).join(", ")})`).join(",\n");
  return `${comment}INSERT INTO ${quoteIdentifier(block.table)} (${columns}) VALUES\n${tuples};\n`;
}

export const FOOTER = "\nCOMMIT;\n";

/**
 * Writes the transaction header on construction, a block per table, and COMMIT at the end
 */
export class SqlDumpWriter extends Transform {
  private header: readonly string[];
  private blocks = 0;
  private rows = 0;

  constructor(options: SqlDumpWriterOptions = {}) {
    super({
      writableObjectMode: true, // Input is table blocks
      readableObjectMode: false, // Output is text
    });
    this.header = options.header ?? [];
  }

  get tablesWritten(): number {
    return this.blocks;
  }

  get rowsWritten(): number {
    return this.rows;
  }

  _construct(callback: (error?: Error | null) => void): void {
    this.push(renderHeader(this.header));
    callback();
  }

  _transform(chunk: unknown, _encoding: BufferEncoding, callback: TransformCallback): void {
    if (!isTableBlock(chunk)) {
      callback(new GenerationError("SqlDumpWriter received something other than a table block"));
      return;
    }

    this.blocks++;
    this.rows += chunk.rows.length;
    callback(null, renderTableBlock(chunk));
  }

  _flush(callback: TransformCallback): void {
    this.push(FOOTER);
    callback();
  }
}

export function createSqlDumpWriter(options?: SqlDumpWriterOptions): SqlDumpWriter {
  return new SqlDumpWriter(options);
}

/**
 * Render a complete dump in memory
 */
export function renderDump(blocks: readonly TableBlock[], options: SqlDumpWriterOptions = {}): string {
  return renderHeader(options.header ?? []) + blocks.map(renderTableBlock).join("") + FOOTER;
}
