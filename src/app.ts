import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { config } from './config';
import { Services } from './services';
import { AuthController } from './controllers/AuthController';
import { UserController } from './controllers/UserController';
import { EmployeeController } from './controllers/EmployeeController';
import { LeaveController } from './controllers/LeaveController';
import { AttendanceController } from './controllers/AttendanceController';
import { ProjectController } from './controllers/ProjectController';
import { createAuthRoutes } from './routes/authRoutes';
import { createUserRoutes } from './routes/userRoutes';
import { createEmployeeRoutes } from './routes/employeeRoutes';
import { createLeaveRoutes } from './routes/leaveRoutes';
import { createAttendanceRoutes } from './routes/attendanceRoutes';
import { createProjectRoutes } from './routes/projectRoutes';
import { createAuthenticate } from './middleware/auth';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { requestLogger } from './middleware/requestLogger';
import { correlationIdMiddleware } from './middleware/correlationId';

export const createApp = (services: Services): express.Application => {
  const app = express();

  // Correlation ID tracking (should be first)
  app.use(correlationIdMiddleware);

  app.use(helmet());

  app.use(cors({
    origin: config.allowedOrigins,
    credentials: true,
    methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'x-request-id', 'x-correlation-id']
  }));

  app.use(express.json({ limit: '1mb' }));

  app.use(requestLogger);

  app.get('/health', (_req, res) => {
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      version: process.env.npm_package_version || '1.0.0'
    });
  });

  const authenticate = createAuthenticate(services.auth);

  app.use('/api/auth', createAuthRoutes(new AuthController(services.auth, services.employees), authenticate));
  app.use('/api/users', createUserRoutes(new UserController(services.users), authenticate));
  app.use('/api/employees', createEmployeeRoutes(new EmployeeController(services.employees), authenticate));
  app.use('/api/leave', createLeaveRoutes(new LeaveController(services.leave), authenticate));
  app.use('/api/attendance', createAttendanceRoutes(new AttendanceController(services.attendance), authenticate));
  app.use('/api/projects', createProjectRoutes(new ProjectController(services.projects), authenticate));

  app.use(notFoundHandler);

  // Global error handler
  app.use(errorHandler);

  return app;
};
