/**
 * Introspector module types
 */

/**
 * Minimal query surface the introspector needs; satisfied by a pg Pool adapter or an in-process fake
 */
export interface QueryClient {
  query(text: string, values?: readonly unknown[]): Promise<{ rows: unknown[] }>;
}

export interface IntrospectionOptions {
  /** Database schema to read; defaults to "public" */
  schemaName?: string;
  /** Distinct values sampled per eligible column; 0 disables sampling */
  sampleLimit?: number;
}

export const DEFAULT_SCHEMA_NAME = "public";
export const DEFAULT_SAMPLE_LIMIT = 20;
