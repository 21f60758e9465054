/**
 * Emitter module types
 */

export interface SqlDumpWriterOptions {
  /** Comment lines written before BEGIN, without the leading "--" */
  header?: readonly string[];
}
