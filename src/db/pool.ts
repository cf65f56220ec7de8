import { Pool, types } from "pg";

// DATE columns come back as plain YYYY-MM-DD strings, not JS Dates at local midnight
const DATE_OID = 1082;
types.setTypeParser(DATE_OID, (value: string) => value);

export function createPool(connectionString: string, ssl: boolean = false): Pool {
  return new Pool({
    connectionString,
    ssl: ssl ? { rejectUnauthorized: false } : undefined,
  });
}
