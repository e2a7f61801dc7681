import { Queryable } from '../../connection';
import { Migration } from '../index';

export const createUsersTable: Migration = {
  id: '001',
  name: 'Create users table',

  async up(client: Queryable): Promise<void> {
    await client.query(`
      CREATE EXTENSION IF NOT EXISTS pgcrypto;

      CREATE TABLE IF NOT EXISTS users (
        id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
        username VARCHAR(150) UNIQUE NOT NULL,
        email VARCHAR(255) NOT NULL,
        password_hash VARCHAR(255) NOT NULL,
        first_name VARCHAR(150) NOT NULL DEFAULT '',
        last_name VARCHAR(150) NOT NULL DEFAULT '',
        role VARCHAR(20) NOT NULL DEFAULT 'EMPLOYEE'
          CHECK (role IN ('EMPLOYEE', 'MANAGER', 'HR', 'ADMIN')),
        is_superuser BOOLEAN NOT NULL DEFAULT false,
        employee_code VARCHAR(20) UNIQUE,
        phone_number VARCHAR(20),
        department VARCHAR(100),
        hire_date DATE,
        is_active BOOLEAN NOT NULL DEFAULT true,
        created_at TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT CURRENT_TIMESTAMP,
        updated_at TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT CURRENT_TIMESTAMP
      );

      CREATE UNIQUE INDEX IF NOT EXISTS idx_users_username_lower ON users (lower(username));
      CREATE INDEX IF NOT EXISTS idx_users_role ON users (role);
      CREATE INDEX IF NOT EXISTS idx_users_active ON users (is_active);
      CREATE INDEX IF NOT EXISTS idx_users_name ON users (last_name, first_name);
    `);
  },

  async down(client: Queryable): Promise<void> {
    await client.query('DROP TABLE IF EXISTS users CASCADE;');
  }
};
