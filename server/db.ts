import { Pool } from "pg";

import { env } from "./config/env";
import { ConfigurationError } from "./errors";

let pool: Pool | null = null;

export function getPool(): Pool {
  if (pool) {
    return pool;
  }
  if (!env.DATABASE_URL) {
    throw new ConfigurationError("DATABASE_URL is not configured");
  }
  pool = new Pool({ connectionString: env.DATABASE_URL });
  return pool;
}

export async function closePool(): Promise<void> {
  if (!pool) return;
  const current = pool;
  pool = null;
  await current.end();
}
