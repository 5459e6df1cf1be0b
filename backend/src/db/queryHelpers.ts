import { Pool, QueryResult, QueryResultRow } from 'pg';

/**
 * Generic query helper with error handling
 */
export const query = async <T extends QueryResultRow>(
  db: Pool,
  text: string,
  params: unknown[] = []
): Promise<QueryResult<T>> => {
  try {
    return await db.query<T>(text, params);
  } catch (error) {
    console.error('[db] Query error:', error);
    throw error;
  }
};

/**
 * Execute a query and return the first row or null
 */
export const queryOne = async <T extends QueryResultRow>(
  db: Pool,
  text: string,
  params: unknown[] = []
): Promise<T | null> => {
  const result = await query<T>(db, text, params);
  return result.rows[0] ?? null;
};

/**
 * Execute a query and return all rows
 */
export const queryMany = async <T extends QueryResultRow>(
  db: Pool,
  text: string,
  params: unknown[] = []
): Promise<T[]> => {
  const result = await query<T>(db, text, params);
  return result.rows;
};

/**
 * Insert a record and return the inserted row
 */
export const insertOne = async <T extends QueryResultRow>(
  db: Pool,
  table: string,
  data: Record<string, unknown>
): Promise<T> => {
  const keys = Object.keys(data);
  const values = Object.values(data);
  const placeholders = keys.map((_, i) => `$${i + 1}`).join(', ');
  const columns = keys.join(', ');

  const text = `
    INSERT INTO ${table} (${columns})
    VALUES (${placeholders})
    RETURNING *
  `;

  const result = await queryOne<T>(db, text, values);
  if (!result) {
    throw new Error(`Failed to insert into ${table}`);
  }
  return result;
};

/**
 * Insert a record unless a unique constraint already holds it.
 * Returns null when the row already existed.
 */
export const insertIfAbsent = async <T extends QueryResultRow>(
  db: Pool,
  table: string,
  data: Record<string, unknown>,
  conflictTarget: string
): Promise<T | null> => {
  const keys = Object.keys(data);
  const values = Object.values(data);
  const placeholders = keys.map((_, i) => `$${i + 1}`).join(', ');

  const text = `
    INSERT INTO ${table} (${keys.join(', ')})
    VALUES (${placeholders})
    ON CONFLICT ${conflictTarget} DO NOTHING
    RETURNING *
  `;

  return queryOne<T>(db, text, values);
};

/**
 * Update a record by ID and return the updated row
 */
export const updateById = async <T extends QueryResultRow>(
  db: Pool,
  table: string,
  id: string,
  data: Record<string, unknown>
): Promise<T | null> => {
  const keys = Object.keys(data);
  const values = Object.values(data);
  const setClause = keys.map((key, i) => `${key} = $${i + 1}`).join(', ');

  const text = `
    UPDATE ${table}
    SET ${setClause}, updated_at = NOW()
    WHERE id = $${keys.length + 1}
    RETURNING *
  `;

  return queryOne<T>(db, text, [...values, id]);
};
