import { Queryable } from '../../connection';
import { Migration } from '../index';

export const createProjectsTables: Migration = {
  id: '005',
  name: 'Create projects and project members tables',

  async up(client: Queryable): Promise<void> {
    await client.query(`
      CREATE TABLE IF NOT EXISTS projects (
        id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
        name VARCHAR(200) NOT NULL,
        description TEXT NOT NULL DEFAULT '',
        manager_id UUID REFERENCES users(id) ON DELETE SET NULL,
        start_date DATE NOT NULL,
        end_date DATE,
        status VARCHAR(20) NOT NULL DEFAULT 'ACTIVE'
          CHECK (status IN ('ACTIVE', 'COMPLETED', 'ON_HOLD', 'CANCELLED', 'PLANNING')),
        created_at TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT CURRENT_TIMESTAMP,
        updated_at TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT CURRENT_TIMESTAMP
      );

      CREATE TABLE IF NOT EXISTS project_members (
        project_id UUID NOT NULL REFERENCES projects(id) ON DELETE CASCADE,
        employee_id UUID NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        role VARCHAR(100) NOT NULL DEFAULT '',
        joined_on DATE NOT NULL DEFAULT CURRENT_DATE,
        PRIMARY KEY (project_id, employee_id)
      );
    `);
  },

  async down(client: Queryable): Promise<void> {
    await client.query(`
      DROP TABLE IF EXISTS project_members CASCADE;
      DROP TABLE IF EXISTS projects CASCADE;
    `);
  }
};
