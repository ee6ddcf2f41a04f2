import { drizzle } from "drizzle-orm/postgres-js";
import postgres from "postgres";

/**
 * Typed ORM handle plus the raw client, which callers close on shutdown.
 */
export const createDb = (connectionString: string) => {
  const sql = postgres(connectionString, { max: 10 });
  const db = drizzle(sql);
  return { db, sql };
};
