/**
 * Per-row memory letting later columns agree with values generated earlier in the same row
 */

import { normalizeName } from "../classifier/column-name.js";

export const NULL_MARKER = "NULL";

const START_LIKE_TERMS = ["signed", "created", "established", "start", "launched"] as const;

/** Key a start date is also stored under when its column name carries no start-like term */
export const START_DATE_KEY = "start_date";

export function isStartLikeKey(key: string): boolean {
  const normalized = normalizeName(key);
  return START_LIKE_TERMS.some((term) => normalized.includes(term));
}

export class RowContext {
  private values = new Map<string, string>();
  private dates = new Map<string, Date>();

  /**
   * Store a value; null markers and empty values are dropped
   */
  set(key: string, value: string | null | undefined): void {
    if (value === null || value === undefined || value === "" || value === NULL_MARKER) {
      return;
    }
    this.values.set(normalizeName(key), value);
  }

  get(key: string): string | undefined {
    return this.values.get(normalizeName(key));
  }

  has(key: string): boolean {
    return this.values.has(normalizeName(key));
  }

  setDate(key: string, date: Date): void {
    if (Number.isNaN(date.getTime())) {
      return;
    }
    this.dates.set(normalizeName(key), date);
  }

  getDate(key: string): Date | undefined {
    return this.dates.get(normalizeName(key));
  }

  /**
   * Any stored date whose key denotes a start-like concept.
   * A row is expected to carry at most one, so no tie-break is applied.
   */
  getMostRecentStartDate(): Date | undefined {
    for (const [key, date] of this.dates) {
      if (isStartLikeKey(key)) {
        return date;
      }
    }
    return undefined;
  }

  size(): number {
    return this.values.size;
  }
}
