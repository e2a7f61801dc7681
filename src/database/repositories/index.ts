export * from './base';
export * from './user';
export * from './employeeProfile';
export * from './leaveRequest';
export * from './attendance';
export * from './project';

import { IUserRepository, UserRepository } from './user';
import { EmployeeProfileRepository, IEmployeeProfileRepository } from './employeeProfile';
import { ILeaveRequestRepository, LeaveRequestRepository } from './leaveRequest';
import { AttendanceRepository, IAttendanceRepository } from './attendance';
import { IProjectRepository, ProjectRepository } from './project';

export interface Repositories {
  users: IUserRepository;
  profiles: IEmployeeProfileRepository;
  leaveRequests: ILeaveRequestRepository;
  attendance: IAttendanceRepository;
  projects: IProjectRepository;
}

export const createRepositories = (): Repositories => ({
  users: new UserRepository(),
  profiles: new EmployeeProfileRepository(),
  leaveRequests: new LeaveRequestRepository(),
  attendance: new AttendanceRepository(),
  projects: new ProjectRepository()
});
