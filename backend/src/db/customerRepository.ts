import { Pool } from 'pg';
import { Customer } from '../types';
import { CustomerRepository } from './repositories';
import { insertOne, queryMany, queryOne } from './queryHelpers';

type CustomerRow = {
  id: string;
  first_name: string;
  last_name: string;
  source: string;
  created_at: Date;
};

const toCustomer = (row: CustomerRow): Customer => ({
  id: row.id,
  firstName: row.first_name,
  lastName: row.last_name,
  source: row.source,
  createdAt: row.created_at,
});

// LIKE wildcards inside a token must match literally
const escapeLike = (token: string): string => token.replace(/[\\%_]/g, (ch) => `\\${ch}`);

export class PgCustomerRepository implements CustomerRepository {
  constructor(private readonly db: Pool) {}

  async findById(id: string): Promise<Customer | null> {
    const row = await queryOne<CustomerRow>(this.db, 'SELECT * FROM customers WHERE id = $1', [id]);
    return row ? toCustomer(row) : null;
  }

  async searchByNameTokens(tokens: string[], limit: number): Promise<Customer[]> {
    if (tokens.length === 0) {
      return [];
    }

    const patterns = tokens.map((token) => `%${escapeLike(token)}%`);
    const rows = await queryMany<CustomerRow>(
      this.db,
      `SELECT * FROM customers
       WHERE first_name ILIKE ANY($1::text[]) OR last_name ILIKE ANY($1::text[])
       ORDER BY created_at
       LIMIT $2`,
      [patterns, limit]
    );
    return rows.map(toCustomer);
  }

  async create(input: Pick<Customer, 'firstName' | 'lastName' | 'source'>): Promise<Customer> {
    const row = await insertOne<CustomerRow>(this.db, 'customers', {
      first_name: input.firstName,
      last_name: input.lastName,
      source: input.source,
    });
    return toCustomer(row);
  }
}
