/**
 * Streaming table generation
 */

import { Readable } from "stream";
import { GenerationError, errorMessage } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import type { TableBlock } from "./types.js";

/**
 * The subset of DataGenerator a stream needs
 */
export interface TableBlockSource {
  generate(): Iterator<TableBlock>;
}

/**
 * Readable stream that yields one TableBlock per table, in dependency order
 */
export class TableBlockStream extends Readable {
  private source: TableBlockSource;
  private blocks?: Iterator<TableBlock>;
  private emitted = 0;

  constructor(source: TableBlockSource) {
    super({ objectMode: true });
    this.source = source;
  }

  _read(): void {
    try {
      // Lazy: generation starts on the first read
      this.blocks ??= this.source.generate();

      const next = this.blocks.next();
      if (next.done) {
        logger.debug("TableBlockStream finished", { tables: this.emitted });
        this.push(null);
        return;
      }

      this.emitted++;
      this.push(next.value);
    } catch (error) {
      this.destroy(
        error instanceof Error
          ? error
          : new GenerationError("Row generation failed", { reason: errorMessage(error) }),
      );
    }
  }
}

export function createTableStream(source: TableBlockSource): Readable {
  return new TableBlockStream(source);
}
