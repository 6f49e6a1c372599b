import { Pool, type PoolConfig } from 'pg';

const pools: Record<string, Pool> = {};

export const connectionStringFromEnv = (env: NodeJS.ProcessEnv = process.env): string =>
  env.DATABASE_URL ||
  `postgresql://${env.POSTGRES_USER || 'board_local'}:${env.POSTGRES_PASSWORD || 'board_local_password'}@${
    env.POSTGRES_HOST || 'localhost'
  }:${env.POSTGRES_PORT || 5432}/${env.POSTGRES_DB || 'board_local'}`;

export const getPool = (service: string, config?: PoolConfig): Pool => {
  const existing = pools[service];
  if (existing) return existing;
  const connectionString = config?.connectionString || connectionStringFromEnv();
  const pool = new Pool({ ...config, connectionString });
  pools[service] = pool;
  return pool;
};

export const closePools = async (): Promise<void> => {
  const open = Object.keys(pools);
  await Promise.all(
    open.map(async (service) => {
      const pool = pools[service];
      delete pools[service];
      if (pool) await pool.end();
    }),
  );
};

/**
 * Parameterised SQL statement. Values are always bound, never interpolated.
 */
export type SqlQuery = {
  text: string;
  values: unknown[];
};

/**
 * Collects positional parameters while a statement is assembled.
 */
export class SqlParams {
  readonly values: unknown[] = [];

  add(value: unknown): string {
    this.values.push(value);
    return `$${this.values.length}`;
  }
}

// `%` and `_` are wildcards for ilike; match them literally.
export const likePattern = (needle: string): string => `%${needle.replace(/[\\%_]/g, (c) => `\\${c}`)}%`;
