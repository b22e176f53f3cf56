import { drizzle } from "drizzle-orm/postgres-js";
import postgres from "postgres";

export type DbOptions = {
  maxConnections?: number;
};

/**
 * Opens one postgres-js pool and the drizzle handle over it. `close` drains the pool on shutdown.
 */
export const createDb = (connectionString: string, options: DbOptions = {}) => {
  const sql = postgres(connectionString, {
    max: options.maxConnections ?? 10,
    onnotice: () => {},
  });
  const db = drizzle(sql);

  return {
    db,
    sql,
    close: async (): Promise<void> => {
      await sql.end({ timeout: 5 });
    },
  };
};

export type Db = ReturnType<typeof createDb>["db"];
