import { Attendance, describeAttendanceDay } from './Attendance';
import { StateConflictError } from '../../utils/errors';

describe('Attendance Model', () => {
  const employeeId = '123e4567-e89b-42d3-a456-426614174000';
  const loginTime = new Date('2025-03-10T09:00:00Z');

  const open = () => new Attendance({ employeeId, date: '2025-03-10', loginTime });

  it('should start clocked in with defaults', () => {
    const record = open();

    expect(record.isClockedIn).toBe(true);
    expect(record.status).toBe('Clocked in');
    expect(record.workingHours).toBeNull();
    expect(record.riskScore).toBe(0);
    expect(record.ip).toBeNull();
  });

  it('should compute working hours to two decimals on clock-out', () => {
    const closed = open().clockOut(new Date('2025-03-10T17:20:00Z'));

    expect(closed.status).toBe('Completed');
    expect(closed.workingHours).toBe(8.33);
  });

  it('should refuse a second clock-out', () => {
    const closed = open().clockOut(new Date('2025-03-10T17:00:00Z'));

    expect(() => closed.clockOut(new Date('2025-03-10T18:00:00Z'))).toThrow(StateConflictError);
    expect(() => closed.clockOut(new Date('2025-03-10T18:00:00Z'))).toThrow('Already clocked out today');
  });

  describe('describeAttendanceDay', () => {
    const now = new Date('2025-03-10T11:30:00Z');

    it('should report a day without a record', () => {
      expect(describeAttendanceDay('2025-03-10', null, now)).toEqual({
        date: '2025-03-10',
        status: 'Not clocked in',
        loginTime: null,
        logoutTime: null,
        workingHours: null,
        currentWorkingHours: null
      });
    });

    it('should report running hours while clocked in', () => {
      const day = describeAttendanceDay('2025-03-10', open(), now);

      expect(day.status).toBe('Clocked in');
      expect(day.currentWorkingHours).toBe(2.5);
      expect(day.workingHours).toBeNull();
    });

    it('should report final hours once completed', () => {
      const closed = open().clockOut(new Date('2025-03-10T13:00:00Z'));
      const day = describeAttendanceDay('2025-03-10', closed, now);

      expect(day.status).toBe('Completed');
      expect(day.workingHours).toBe(4);
      expect(day.currentWorkingHours).toBeNull();
    });
  });
});
