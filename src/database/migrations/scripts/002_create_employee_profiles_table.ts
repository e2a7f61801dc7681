import { Queryable } from '../../connection';
import { Migration } from '../index';

export const createEmployeeProfilesTable: Migration = {
  id: '002',
  name: 'Create employee profiles table',

  async up(client: Queryable): Promise<void> {
    await client.query(`
      CREATE TABLE IF NOT EXISTS employee_profiles (
        user_id UUID PRIMARY KEY REFERENCES users(id) ON DELETE CASCADE,
        date_of_birth DATE,
        gender CHAR(1) CHECK (gender IN ('M', 'F', 'O', 'P')),
        marital_status CHAR(1) CHECK (marital_status IN ('S', 'M', 'D', 'W', 'O')),
        nationality VARCHAR(100),
        personal_email VARCHAR(255),
        emergency_contact_name VARCHAR(200),
        emergency_contact_phone VARCHAR(20),
        emergency_contact_relation VARCHAR(100),
        address_line1 VARCHAR(255),
        address_line2 VARCHAR(255),
        city VARCHAR(100),
        state VARCHAR(100),
        postal_code VARCHAR(20),
        country VARCHAR(100),
        designation VARCHAR(100),
        department VARCHAR(100),
        date_of_joining DATE,
        employment_status VARCHAR(20) NOT NULL DEFAULT 'ACTIVE'
          CHECK (employment_status IN ('ACTIVE', 'INACTIVE', 'TERMINATED', 'ON_LEAVE', 'PROBATION')),
        manager_id UUID REFERENCES users(id) ON DELETE SET NULL,
        location VARCHAR(100),
        salary NUMERIC(12, 2),
        salary_currency VARCHAR(3) NOT NULL DEFAULT 'USD',
        annual_leaves INTEGER NOT NULL DEFAULT 20,
        sick_leaves INTEGER NOT NULL DEFAULT 10,
        maternity_leaves INTEGER NOT NULL DEFAULT 90,
        paternity_leaves INTEGER NOT NULL DEFAULT 15,
        emergency_leaves INTEGER NOT NULL DEFAULT 5,
        compensatory_leaves INTEGER NOT NULL DEFAULT 0,
        created_at TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT CURRENT_TIMESTAMP,
        updated_at TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT CURRENT_TIMESTAMP
      );

      CREATE INDEX IF NOT EXISTS idx_employee_profiles_manager ON employee_profiles (manager_id);
    `);
  },

  async down(client: Queryable): Promise<void> {
    await client.query('DROP TABLE IF EXISTS employee_profiles CASCADE;');
  }
};
