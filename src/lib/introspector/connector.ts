/**
 * PostgreSQL connection management
 */

import { Pool } from "pg";
import { IntrospectionError, errorMessage } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import type { QueryClient } from "./types.js";

/**
 * Sanitize URI for logging (remove credentials)
 */
export function sanitizeUri(uri: string): string {
  try {
    const url = new URL(uri);
    if (url.username || url.password) {
      return uri.replace(/:\/\/[^@]+@/, "://***:***@");
    }
    return uri;
  } catch {
    return "postgres://***";
  }
}

export function isPostgresUrl(locator: string): boolean {
  return /^postgres(ql)?:\/\//i.test(locator);
}

export class PostgresConnector implements QueryClient {
  private pool: Pool | null = null;

  /**
   * Open a small pool and check it answers
   */
  async connect(uri: string): Promise<void> {
    const sanitized = sanitizeUri(uri);
    logger.info("Connecting to PostgreSQL: " + sanitized);

    const pool = new Pool({
      connectionString: uri,
      max: 4,
      connectionTimeoutMillis: 5000,
      idleTimeoutMillis: 10000,
    });

    try {
      await pool.query("SELECT 1");
    } catch (error) {
      await pool.end().catch((endError: unknown) => {
        logger.debug("Pool shutdown after failed connect also failed", endError);
      });
      logger.error("PostgreSQL connection failed", error);
      throw new IntrospectionError(
        "Failed to connect to PostgreSQL",
        { url: sanitized, reason: errorMessage(error) },
        { cause: error },
      );
    }

    this.pool = pool;
    logger.info("Connected to PostgreSQL");
  }

  async query(text: string, values?: readonly unknown[]): Promise<{ rows: unknown[] }> {
    if (!this.pool) {
      throw new IntrospectionError("Not connected to PostgreSQL. Call connect() first.");
    }
    const result = await this.pool.query(text, values ? [...values] : undefined);
    return { rows: result.rows };
  }

  async close(): Promise<void> {
    if (this.pool) {
      await this.pool.end();
      this.pool = null;
      logger.info("PostgreSQL connection closed");
    }
  }

  isConnected(): boolean {
    return this.pool !== null;
  }
}
