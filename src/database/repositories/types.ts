// Column shapes as node-postgres returns them. DATE columns arrive as
// `YYYY-MM-DD` strings (see the type parser in ../connection).

export type UserRow = {
  id: string;
  username: string;
  email: string;
  password_hash: string;
  first_name: string;
  last_name: string;
  role: string;
  is_superuser: boolean;
  employee_code: string | null;
  phone_number: string | null;
  department: string | null;
  hire_date: string | null;
  is_active: boolean;
  created_at: Date;
  updated_at: Date;
};

export type DirectoryRow = UserRow & {
  designation: string | null;
  manager_id: string | null;
};

export type EmployeeProfileRow = {
  user_id: string;
  date_of_birth: string | null;
  gender: string | null;
  marital_status: string | null;
  nationality: string | null;
  personal_email: string | null;
  emergency_contact_name: string | null;
  emergency_contact_phone: string | null;
  emergency_contact_relation: string | null;
  address_line1: string | null;
  address_line2: string | null;
  city: string | null;
  state: string | null;
  postal_code: string | null;
  country: string | null;
  designation: string | null;
  department: string | null;
  date_of_joining: string | null;
  employment_status: string;
  manager_id: string | null;
  location: string | null;
  salary: string | null;
  salary_currency: string;
  annual_leaves: number;
  sick_leaves: number;
  maternity_leaves: number;
  paternity_leaves: number;
  emergency_leaves: number;
  compensatory_leaves: number;
  created_at: Date;
  updated_at: Date;
};

export type LeaveRequestRow = {
  id: string;
  employee_id: string;
  leave_type: string;
  from_date: string;
  to_date: string;
  reason: string;
  status: string;
  approver_id: string | null;
  applied_on: Date;
  decided_on: Date | null;
  rejection_reason: string | null;
  updated_at: Date;
};

export type AttendanceRow = {
  id: string;
  employee_id: string;
  date: string;
  login_time: Date;
  logout_time: Date | null;
  ip: string | null;
  device_info: string | null;
  location: string | null;
  risk_score: number;
};

export type ProjectRow = {
  id: string;
  name: string;
  description: string;
  manager_id: string | null;
  start_date: string;
  end_date: string | null;
  status: string;
  created_at: Date;
  updated_at: Date;
};

export type ProjectSummaryRow = ProjectRow & {
  member_count: number;
};

export type ProjectMemberRow = {
  project_id: string;
  employee_id: string;
  role: string;
  joined_on: string;
  first_name: string;
  last_name: string;
  username: string;
};

export type CountRow = {
  total: number;
};
