import request from 'supertest';
import { createTestContext, TestContext } from '../support/testApp';
import { IDS, makeUser } from '../support/fixtures';

jest.mock('../../utils/logger');

describe('HTTP API', () => {
  let ctx: TestContext;

  const admin = makeUser({ id: IDS.admin, role: 'ADMIN' });
  const hr = makeUser({ id: IDS.hr, role: 'HR', department: 'People' });
  const manager = makeUser({ id: IDS.manager, role: 'MANAGER', department: 'Engineering' });
  const employee = makeUser({ id: IDS.employee, username: 'jdoe', department: 'Engineering' });

  const bearer = (user: typeof admin) => `Bearer ${ctx.tokenFor(user)}`;

  beforeEach(async () => {
    ctx = createTestContext('2025-03-10T09:00:00');
    ctx.store.addUser(admin);
    ctx.store.addUser(hr);
    ctx.store.addUser(manager);
    ctx.store.addUser(
      { ...employee, passwordHash: await ctx.services.auth.hashPassword('test-password') },
      { managerId: IDS.manager }
    );
  });

  describe('plumbing', () => {
    test('GET /health reports healthy', async () => {
      const response = await request(ctx.app).get('/health').expect(200);

      expect(response.body.status).toBe('healthy');
    });

    test('unknown routes get a 404 error body', async () => {
      const response = await request(ctx.app).get('/api/nowhere').expect(404);

      expect(response.body.error.code).toBe('NOT_FOUND');
      expect(response.body.error.message).toBe('Route GET /api/nowhere not found');
    });

    test('echoes the caller request id', async () => {
      const response = await request(ctx.app).get('/health').set('x-request-id', 'req-123').expect(200);

      expect(response.headers['x-request-id']).toBe('req-123');
    });

    test('malformed JSON is a 400', async () => {
      const response = await request(ctx.app)
        .post('/api/auth/login')
        .set('Content-Type', 'application/json')
        .send('{"username":')
        .expect(400);

      expect(response.body.error.code).toBe('INVALID_JSON');
    });
  });

  describe('authentication', () => {
    test('logs in with valid credentials', async () => {
      const response = await request(ctx.app)
        .post('/api/auth/login')
        .send({ username: 'jdoe', password: 'test-password' })
        .expect(200);

      expect(response.body.message).toBe('Login successful');
      expect(response.body.data.accessToken).toEqual(expect.any(String));
      expect(response.body.data.user.id).toBe(IDS.employee);
      expect(response.body.data.user.passwordHash).toBeUndefined();
    });

    test('rejects a wrong password', async () => {
      const response = await request(ctx.app)
        .post('/api/auth/login')
        .send({ username: 'jdoe', password: 'wrong-password' })
        .expect(401);

      expect(response.body.error.message).toBe('Invalid username or password');
    });

    test('the issued token authenticates /me', async () => {
      const login = await request(ctx.app)
        .post('/api/auth/login')
        .send({ username: 'jdoe', password: 'test-password' });

      const response = await request(ctx.app)
        .get('/api/auth/me')
        .set('Authorization', `Bearer ${login.body.data.accessToken}`)
        .expect(200);

      expect(response.body.data.managerId).toBe(IDS.manager);
    });

    test('protected routes need a token', async () => {
      const response = await request(ctx.app).get('/api/leave/requests').expect(401);

      expect(response.body.error.message).toBe('Authentication token is required');
    });

    test('a deactivated account loses access', async () => {
      ctx.store.users.set(IDS.employee, { ...employee, isActive: false });

      const response = await request(ctx.app)
        .get('/api/leave/requests')
        .set('Authorization', bearer(employee))
        .expect(401);

      expect(response.body.error.message).toBe('Account is not active');
    });
  });

  describe('leave workflow', () => {
    const application = {
      leaveType: 'ANNUAL',
      fromDate: '2025-03-12',
      toDate: '2025-03-14',
      reason: 'Family trip'
    };

    const submit = () =>
      request(ctx.app)
        .post('/api/leave/requests')
        .set('Authorization', bearer(employee))
        .send(application);

    test('submit, approve, then report the balance', async () => {
      const submitted = await submit().expect(201);
      expect(submitted.body.data.status).toBe('PENDING');
      expect(submitted.body.data.durationDays).toBe(3);

      const id: string = submitted.body.data.id;
      const approved = await request(ctx.app)
        .put(`/api/leave/requests/${id}/approve`)
        .set('Authorization', bearer(manager))
        .expect(200);
      expect(approved.body.data.status).toBe('APPROVED');
      expect(approved.body.data.approverId).toBe(IDS.manager);

      const balance = await request(ctx.app)
        .get(`/api/leave/balance?employeeId=${IDS.employee}`)
        .set('Authorization', bearer(manager))
        .expect(200);
      expect(balance.body.data.year).toBe(2025);
      expect(balance.body.data.balances[0]).toEqual({
        leaveType: 'ANNUAL',
        label: 'Annual Leave',
        configured: 17,
        used: 3,
        available: 14
      });
    });

    test('an employee cannot approve', async () => {
      const submitted = await submit().expect(201);

      const response = await request(ctx.app)
        .put(`/api/leave/requests/${submitted.body.data.id}/approve`)
        .set('Authorization', bearer(employee))
        .expect(403);

      expect(response.body.error.message).toBe('Not permitted');
    });

    test('a second decision is a state conflict', async () => {
      const submitted = await submit().expect(201);
      const path = `/api/leave/requests/${submitted.body.data.id}`;

      await request(ctx.app).put(`${path}/approve`).set('Authorization', bearer(manager)).expect(200);
      const response = await request(ctx.app)
        .put(`${path}/reject`)
        .set('Authorization', bearer(hr))
        .send({ rejectionReason: 'Too late' })
        .expect(409);

      expect(response.body.error.code).toBe('STATE_CONFLICT');
      expect(response.body.error.message).toBe('Leave request already processed');
    });

    test('overlapping submissions are rejected with the rule', async () => {
      await submit().expect(201);
      const response = await submit().expect(400);

      expect(response.body.error.details.rule).toBe('OVERLAP');
    });

    test('a reason is optional', async () => {
      const { reason, ...withoutReason } = application;

      const response = await request(ctx.app)
        .post('/api/leave/requests')
        .set('Authorization', bearer(employee))
        .send(withoutReason)
        .expect(201);

      expect(reason).toBe('Family trip');
      expect(response.body.data.reason).toBe('');
    });

    test('a past start date is reported even without a reason', async () => {
      const response = await request(ctx.app)
        .post('/api/leave/requests')
        .set('Authorization', bearer(employee))
        .send({ ...application, fromDate: '2025-03-01', reason: '' })
        .expect(400);

      expect(response.body.error.message).toBe('Leave start date cannot be in the past.');
      expect(response.body.error.details.rule).toBe('DATE_IN_PAST');
    });

    test('malformed dates fail validation', async () => {
      const response = await request(ctx.app)
        .post('/api/leave/requests')
        .set('Authorization', bearer(employee))
        .send({ ...application, toDate: '14/03/2025' })
        .expect(400);

      expect(response.body.error.code).toBe('VALIDATION_ERROR');
    });

    test('the manager sees the pending request', async () => {
      await submit().expect(201);

      const response = await request(ctx.app)
        .get('/api/leave/requests/pending')
        .set('Authorization', bearer(manager))
        .expect(200);

      expect(response.body.data).toHaveLength(1);
      expect(response.body.data[0].employeeId).toBe(IDS.employee);
    });
  });

  describe('attendance', () => {
    test('clocking in twice on one day conflicts', async () => {
      await request(ctx.app)
        .post('/api/attendance/clock-in')
        .set('Authorization', bearer(employee))
        .expect(201);

      const response = await request(ctx.app)
        .post('/api/attendance/clock-in')
        .set('Authorization', bearer(employee))
        .expect(409);

      expect(response.body.error.message).toBe('Already clocked in today');
    });

    test('an employee cannot read team attendance', async () => {
      await request(ctx.app)
        .get('/api/attendance/team')
        .set('Authorization', bearer(employee))
        .expect(403);
    });
  });

  describe('user administration', () => {
    test('HR cannot assign roles', async () => {
      await request(ctx.app)
        .put(`/api/users/${IDS.employee}/role`)
        .set('Authorization', bearer(hr))
        .send({ role: 'MANAGER' })
        .expect(403);

      expect(ctx.store.users.get(IDS.employee)?.role).toBe('EMPLOYEE');
    });

    test('an admin can assign roles', async () => {
      await request(ctx.app)
        .put(`/api/users/${IDS.employee}/role`)
        .set('Authorization', bearer(admin))
        .send({ role: 'MANAGER' })
        .expect(200);

      expect(ctx.store.users.get(IDS.employee)?.role).toBe('MANAGER');
    });
  });

  describe('directory', () => {
    test('filters by department', async () => {
      const response = await request(ctx.app)
        .get('/api/employees?department=engineering')
        .set('Authorization', bearer(hr))
        .expect(200);

      expect(response.body.data.total).toBe(2);
      expect(response.body.data.data.map((entry: { id: string }) => entry.id).sort()).toEqual([
        IDS.manager,
        IDS.employee
      ]);
    });

    test('is closed to employees', async () => {
      await request(ctx.app)
        .get('/api/employees')
        .set('Authorization', bearer(employee))
        .expect(403);
    });
  });
});
