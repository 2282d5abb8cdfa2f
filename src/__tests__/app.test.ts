import bcrypt from 'bcryptjs';
import request from 'supertest';
import { beforeAll, beforeEach, describe, expect, it } from 'vitest';
import { createApp } from '../app';
import { loadAppConfig } from '../connections/config/app.config';
import { createAuthService } from '../modules/auth/auth.service';
import { createReportsService } from '../modules/reports/reports.service';
import { createFakeDatabase, InMemorySessionsRepository, InMemoryUsersRepository } from './helpers/fakes';

const config = loadAppConfig({
  NODE_ENV: 'test',
  JWT_SECRET: 'test-secret',
  LOGIN_RATE_MAX: '3',
});

describe('HTTP API', () => {
  let passwordHash: string;
  let fake: ReturnType<typeof createFakeDatabase>;
  let sessions: InMemorySessionsRepository;
  let app: ReturnType<typeof createApp>;

  beforeAll(async () => {
    passwordHash = await bcrypt.hash('admin123', 4);
  });

  beforeEach(async () => {
    const users = new InMemoryUsersRepository();
    await users.create({ username: 'admin', password_hash: passwordHash });
    sessions = new InMemorySessionsRepository(users);
    fake = createFakeDatabase();

    const auth = createAuthService(users, sessions, {
      jwtSecret: config.jwtSecret,
      sessionTtlSeconds: config.sessionTtlSeconds,
      defaultRedirect: config.defaultRedirect,
      defaultUser: config.defaultUser,
    });
    const reports = createReportsService(fake.db, { locale: config.reportLocale });

    app = createApp({ config, db: fake.db, auth, reports });
  });

  const login = async () => {
    const response = await request(app)
      .post('/api/auth/login')
      .send({ username: 'admin', password: 'admin123' });
    return String(response.body.data.token);
  };

  describe('auth', () => {
    it('logs in and reports where to go next', async () => {
      const response = await request(app)
        .post('/api/auth/login')
        .send({ username: 'admin', password: 'admin123', next: '/purchases/top' });

      expect(response.status).toBe(200);
      expect(response.body.success).toBe(true);
      expect(response.body.message).toBe('Welcome, admin!');
      expect(response.body.data.redirectTo).toBe('/purchases/top');
      expect(response.body.data.user).toEqual({ id: 1, username: 'admin' });
      expect(typeof response.body.data.token).toBe('string');
    });

    it('ignores off-site redirect targets', async () => {
      const response = await request(app)
        .post('/api/auth/login?next=//example.com')
        .send({ username: 'admin', password: 'admin123' });

      expect(response.body.data.redirectTo).toBe('/purchases');
    });

    it('accepts form-encoded credentials', async () => {
      const response = await request(app)
        .post('/api/auth/login')
        .type('form')
        .send('username=admin&password=admin123');

      expect(response.status).toBe(200);
    });

    it('rejects bad credentials', async () => {
      const response = await request(app)
        .post('/api/auth/login')
        .send({ username: 'admin', password: 'wrong' });

      expect(response.status).toBe(401);
      expect(response.body).toEqual({
        success: false,
        message: 'Invalid username or password',
        error: { code: 'INVALID_CREDENTIALS' },
      });
    });

    it('requires credentials', async () => {
      const response = await request(app).post('/api/auth/login').send({});

      expect(response.status).toBe(400);
      expect(response.body.error.code).toBe('MISSING_CREDENTIALS');
    });

    it('answers malformed JSON with 400', async () => {
      const response = await request(app)
        .post('/api/auth/login')
        .set('Content-Type', 'application/json')
        .send('{"username":');

      expect(response.status).toBe(400);
      expect(response.body.message).toBe('Malformed request body');
      expect(response.body.error.code).toBe('BAD_REQUEST');
    });

    it('rate limits login attempts', async () => {
      for (let attempt = 0; attempt < 3; attempt++) {
        await request(app).post('/api/auth/login').send({ username: 'admin', password: 'wrong' });
      }

      const response = await request(app)
        .post('/api/auth/login')
        .send({ username: 'admin', password: 'admin123' });

      expect(response.status).toBe(429);
      expect(response.body.error.code).toBe('TOO_MANY_REQUESTS');
      expect(response.headers['retry-after']).toBe('900');
    });

    it('returns the current user', async () => {
      const token = await login();

      const response = await request(app).get('/api/auth/me').set('Authorization', `Bearer ${token}`);

      expect(response.status).toBe(200);
      expect(response.body.data).toEqual({ user: { id: 1, username: 'admin' } });
    });

    it('logs out without a session', async () => {
      const response = await request(app).post('/api/auth/logout');

      expect(response.status).toBe(200);
      expect(response.body.message).toBe('You have been logged out');
    });

    it('ends the session on logout', async () => {
      const token = await login();

      const logout = await request(app).post('/api/auth/logout').set('Authorization', `Bearer ${token}`);
      const after = await request(app).get('/api/purchases').set('Authorization', `Bearer ${token}`);

      expect(logout.status).toBe(200);
      expect(sessions.sessions.size).toBe(0);
      expect(after.status).toBe(401);
    });
  });

  describe('reports', () => {
    it('requires a session', async () => {
      const response = await request(app).get('/api/purchases');

      expect(response.status).toBe(401);
      expect(response.body.message).toBe('Please log in to access this page');
      expect(response.body.error.code).toBe('UNAUTHENTICATED');
      expect(fake.query).not.toHaveBeenCalled();
    });

    it('rejects a malformed authorization header', async () => {
      const response = await request(app).get('/api/stock-movements').set('Authorization', 'Token abc');

      expect(response.status).toBe(401);
    });

    it('lists purchases for the requested range', async () => {
      const token = await login();
      fake.query.mockResolvedValueOnce([
        {
          id: 5,
          product_code: 1001,
          description: 'Hex bolt M8',
          quantity: '2.000',
          unit_price: '1.25',
          total_value: '2.50',
          date: '2026-01-15',
          account_id: null,
          user_id: 1,
        },
      ]);

      const response = await request(app)
        .get('/api/purchases?start_date=2026-01-01&end_date=2026-01-31&account_id=x')
        .set('Authorization', `Bearer ${token}`);

      expect(response.status).toBe(200);
      expect(response.body.message).toBe('Purchases retrieved');
      expect(response.body.data.rows).toEqual([
        {
          date: '15/01/2026',
          code: 1001,
          description: 'Hex bolt M8',
          quantity: 2,
          unitPrice: 1.25,
          total: 2.5,
          account: '-',
        },
      ]);
      expect(response.body.data.filters).toEqual({
        startDate: '2026-01-01',
        endDate: '2026-01-31',
        accountId: 'x',
        product: '',
        movementType: 'all',
      });
      expect(fake.query).toHaveBeenCalledWith(expect.stringContaining('FROM purchases'), ['2026-01-01', '2026-01-31']);
    });

    it('selects the average price mode from the query string', async () => {
      const token = await login();
      fake.query.mockResolvedValueOnce([]);

      const response = await request(app)
        .get('/api/purchases/average-price?mode=product')
        .set('Authorization', `Bearer ${token}`);

      expect(response.status).toBe(200);
      expect(response.body.data.mode).toBe('product');
    });

    it('serves stock movements with the movement type filter', async () => {
      const token = await login();
      fake.query.mockResolvedValueOnce([]);

      const response = await request(app)
        .get('/api/stock-movements?movement_type=inbound&start_date=2026-01-01&end_date=2026-01-31')
        .set('Authorization', `Bearer ${token}`);

      expect(response.status).toBe(200);
      expect(response.body.data.filters.movementType).toBe('inbound');
      expect(fake.query).toHaveBeenCalledWith(expect.stringContaining('inbound_quantity > 0'), [
        '2026-01-01',
        '2026-01-31',
      ]);
    });

    it('answers storage failures with 500', async () => {
      const token = await login();
      fake.query.mockRejectedValueOnce(new Error('connection refused'));

      const response = await request(app).get('/api/purchases/top').set('Authorization', `Bearer ${token}`);

      expect(response.status).toBe(500);
      expect(response.body.message).toBe('Failed to load top purchases');
      expect(response.body.error.code).toBe('INTERNAL_ERROR');
    });
  });

  describe('infrastructure', () => {
    it('reports health', async () => {
      fake.query.mockResolvedValueOnce([{ '?column?': 1 }]);

      const response = await request(app).get('/health');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ status: 'ok', database: 'connected' });
    });

    it('answers unknown routes with 404', async () => {
      const response = await request(app).get('/api/unknown');

      expect(response.status).toBe(404);
      expect(response.body.message).toBe('Route not found');
      expect(response.body.error.code).toBe('NOT_FOUND');
    });
  });
});
