/**
 * ReferencePool keeps the primary-key values emitted per table so foreign keys can point at real rows.
 * Pools only grow during a run; a table's pool is created on its first appended value.
 */

import type { Faker } from "@faker-js/faker";

export class ReferencePool {
  private pools: Map<string, string[]> = new Map();

  /**
   * Append a primary-key value to a table's pool
   */
  add(table: string, value: string): void {
    const pool = this.pools.get(table);
    if (pool) {
      pool.push(value);
    } else {
      this.pools.set(table, [value]);
    }
  }

  /**
   * Uniformly pick one value, or undefined when the table is unknown or has no values yet
   */
  pick(table: string, random: Faker): string | undefined {
    const pool = this.pools.get(table);
    if (!pool || pool.length === 0) {
      return undefined;
    }
    return random.helpers.arrayElement(pool);
  }

  get(table: string): readonly string[] {
    return this.pools.get(table) ?? [];
  }

  has(table: string): boolean {
    return this.pools.has(table);
  }

  size(table: string): number {
    return this.pools.get(table)?.length ?? 0;
  }

  tables(): string[] {
    return [...this.pools.keys()];
  }

  clear(): void {
    this.pools.clear();
  }
}
