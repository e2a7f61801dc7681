import { Queryable } from '../../connection';
import { Migration } from '../index';

export const createLeaveRequestsTable: Migration = {
  id: '003',
  name: 'Create leave requests table',

  async up(client: Queryable): Promise<void> {
    await client.query(`
      CREATE TABLE IF NOT EXISTS leave_requests (
        id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
        employee_id UUID NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        leave_type VARCHAR(20) NOT NULL
          CHECK (leave_type IN ('ANNUAL', 'SICK', 'MATERNITY', 'PATERNITY', 'EMERGENCY', 'UNPAID', 'COMPENSATORY', 'OTHER')),
        from_date DATE NOT NULL,
        to_date DATE NOT NULL,
        reason TEXT NOT NULL,
        status VARCHAR(20) NOT NULL DEFAULT 'PENDING'
          CHECK (status IN ('PENDING', 'APPROVED', 'REJECTED', 'CANCELLED')),
        approver_id UUID REFERENCES users(id) ON DELETE SET NULL,
        applied_on TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT CURRENT_TIMESTAMP,
        decided_on TIMESTAMP WITH TIME ZONE,
        rejection_reason TEXT,
        updated_at TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT CURRENT_TIMESTAMP,
        CONSTRAINT chk_leave_requests_dates CHECK (to_date >= from_date)
      );

      CREATE INDEX IF NOT EXISTS idx_leave_requests_employee_status ON leave_requests (employee_id, status);
      CREATE INDEX IF NOT EXISTS idx_leave_requests_dates ON leave_requests (from_date, to_date);
    `);
  },

  async down(client: Queryable): Promise<void> {
    await client.query('DROP TABLE IF EXISTS leave_requests CASCADE;');
  }
};
