import { BalanceTrackedLeaveType, LEAVE_TYPE_LABELS } from './LeaveRequest';

/**
 * Per-type day counters stored on the employee profile.
 */
export interface LeaveBalances {
  annualLeaves: number;
  sickLeaves: number;
  maternityLeaves: number;
  paternityLeaves: number;
  emergencyLeaves: number;
  compensatoryLeaves: number;
}

export const DEFAULT_LEAVE_BALANCES: LeaveBalances = {
  annualLeaves: 20,
  sickLeaves: 10,
  maternityLeaves: 90,
  paternityLeaves: 15,
  emergencyLeaves: 5,
  compensatoryLeaves: 0
};

export const BALANCE_FIELDS: Record<BalanceTrackedLeaveType, keyof LeaveBalances> = {
  ANNUAL: 'annualLeaves',
  SICK: 'sickLeaves',
  MATERNITY: 'maternityLeaves',
  PATERNITY: 'paternityLeaves',
  EMERGENCY: 'emergencyLeaves',
  COMPENSATORY: 'compensatoryLeaves'
};

export interface BalanceLine {
  leaveType: BalanceTrackedLeaveType;
  label: string;
  configured: number;
  used: number;
  available: number;
}

export function balanceLine(
  leaveType: BalanceTrackedLeaveType,
  balances: LeaveBalances,
  used: number
): BalanceLine {
  const configured = balances[BALANCE_FIELDS[leaveType]];
  return {
    leaveType,
    label: LEAVE_TYPE_LABELS[leaveType],
    configured,
    used,
    available: configured - used
  };
}
