import { Pool, type QueryResultRow } from "pg";

export class DatabaseNotConfiguredError extends Error {
  readonly status = 503;

  constructor() {
    super("DATABASE_URL must be set. Did you forget to provision a database?");
    this.name = "DatabaseNotConfiguredError";
  }
}

let pool: Pool | null = null;

export const isDatabaseConfigured = (): boolean => Boolean(process.env.DATABASE_URL);

export const getDatabaseName = (): string | null => {
  const connectionString = process.env.DATABASE_URL;
  if (!connectionString) {
    return null;
  }

  try {
    const name = new URL(connectionString).pathname.replace(/^\//, "");
    return name ? decodeURIComponent(name) : null;
  } catch {
    return null;
  }
};

const getPool = (): Pool => {
  const connectionString = process.env.DATABASE_URL;
  if (!connectionString) {
    throw new DatabaseNotConfiguredError();
  }

  if (!pool) {
    pool = new Pool({
      connectionString,
      ssl: process.env.DATABASE_SSL === "false" ? false : { rejectUnauthorized: false },
    });
  }

  return pool;
};

export const query = async <T extends QueryResultRow>(
  text: string,
  params: unknown[] = [],
): Promise<{ rows: T[] }> => {
  const result = await getPool().query<T>(text, params);
  return { rows: result.rows };
};
