import type pg from "pg";
import type { NewRecord, StoredRecord } from "./record.js";

export interface RecordStore {
  findAll(): Promise<StoredRecord[]>;
  findById(id: number): Promise<StoredRecord | null>;
  insert(record: NewRecord): Promise<StoredRecord>;
  update(record: StoredRecord): Promise<StoredRecord | null>;
  delete(id: number): Promise<boolean>;
}

export interface TransactionalRecordStore extends RecordStore {
  /** Runs `work` in one transaction; a throw from `work` rolls it back and is rethrown. */
  transaction<T>(work: (tx: RecordStore) => Promise<T>): Promise<T>;
}

type RecordRow = {
  id: number;
  name: string;
  message: string;
  note: string | null;
  created_at: Date;
  updated_at: Date;
};

const columns = "id, name, message, note, created_at, updated_at";

const fromRow = (row: RecordRow): StoredRecord => ({
  id: row.id,
  name: row.name,
  message: row.message,
  note: row.note,
  createdAt: row.created_at,
  updatedAt: row.updated_at
});

const bindQueries = (client: pg.PoolClient): RecordStore => ({
  findAll: async () => {
    const result = await client.query<RecordRow>(`SELECT ${columns} FROM records ORDER BY id`);
    return result.rows.map(fromRow);
  },

  findById: async (id) => {
    const result = await client.query<RecordRow>(
      `SELECT ${columns} FROM records WHERE id = $1 LIMIT 1`,
      [id]
    );
    return result.rows[0] ? fromRow(result.rows[0]) : null;
  },

  insert: async (record) => {
    const result = await client.query<RecordRow>(
      `INSERT INTO records (name, message, note, created_at, updated_at)
       VALUES ($1, $2, $3, $4, $5)
       RETURNING ${columns}`,
      [record.name, record.message, record.note, record.createdAt, record.updatedAt]
    );
    const row = result.rows[0];
    if (!row) {
      throw new Error("INSERT returned no row");
    }
    return fromRow(row);
  },

  update: async (record) => {
    const result = await client.query<RecordRow>(
      `UPDATE records
       SET name = $2, message = $3, note = $4, updated_at = $5
       WHERE id = $1
       RETURNING ${columns}`,
      [record.id, record.name, record.message, record.note, record.updatedAt]
    );
    return result.rows[0] ? fromRow(result.rows[0]) : null;
  },

  delete: async (id) => {
    const result = await client.query("DELETE FROM records WHERE id = $1", [id]);
    return (result.rowCount ?? 0) > 0;
  }
});

const withClient = async <T>(pool: pg.Pool, work: (client: pg.PoolClient) => Promise<T>) => {
  const client = await pool.connect();
  try {
    return await work(client);
  } finally {
    client.release();
  }
};

export const createPgRecordStore = (pool: pg.Pool): TransactionalRecordStore => ({
  findAll: () => withClient(pool, (client) => bindQueries(client).findAll()),
  findById: (id) => withClient(pool, (client) => bindQueries(client).findById(id)),
  insert: (record) => withClient(pool, (client) => bindQueries(client).insert(record)),
  update: (record) => withClient(pool, (client) => bindQueries(client).update(record)),
  delete: (id) => withClient(pool, (client) => bindQueries(client).delete(id)),

  transaction: async (work) => {
    const client = await pool.connect();
    let brokenConnection: Error | undefined;
    try {
      await client.query("BEGIN");
      const result = await work(bindQueries(client));
      await client.query("COMMIT");
      return result;
    } catch (error) {
      try {
        await client.query("ROLLBACK");
      } catch (rollbackError) {
        // A client that cannot roll back is destroyed on release instead of pooled.
        brokenConnection = rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError));
      }
      throw error;
    } finally {
      client.release(brokenConnection);
    }
  }
});
