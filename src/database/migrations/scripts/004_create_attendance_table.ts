import { Queryable } from '../../connection';
import { Migration } from '../index';

export const createAttendanceTable: Migration = {
  id: '004',
  name: 'Create attendance table',

  async up(client: Queryable): Promise<void> {
    await client.query(`
      CREATE TABLE IF NOT EXISTS attendance (
        id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
        employee_id UUID NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        date DATE NOT NULL,
        login_time TIMESTAMP WITH TIME ZONE NOT NULL,
        logout_time TIMESTAMP WITH TIME ZONE,
        ip VARCHAR(45),
        device_info TEXT,
        location VARCHAR(255),
        risk_score INTEGER NOT NULL DEFAULT 0,
        CONSTRAINT uq_attendance_employee_date UNIQUE (employee_id, date)
      );

      CREATE INDEX IF NOT EXISTS idx_attendance_date ON attendance (date);
    `);
  },

  async down(client: Queryable): Promise<void> {
    await client.query('DROP TABLE IF EXISTS attendance CASCADE;');
  }
};
