import crypto from 'crypto';
import request from 'supertest';
import { createToken, parseExpiresIn, verifyToken } from '../src/middleware/auth';
import { TEST_PASSWORD, TestContext, buildTestApp, signIn, silenceConsole } from './helpers';

describe('auth API', () => {
  let ctx: TestContext;

  beforeAll(() => silenceConsole());

  beforeEach(() => {
    ctx = buildTestApp();
  });

  it('creates the first account only while none exists', async () => {
    const before = await request(ctx.app).get('/api/v1/auth/setup');
    expect(before.body.data).toEqual({ needsSetup: true });

    const created = await request(ctx.app)
      .post('/api/v1/auth/setup')
      .send({ username: ' alice ', password: TEST_PASSWORD });
    expect(created.status).toBe(201);
    expect(created.body.data.username).toBe('alice');

    const again = await request(ctx.app)
      .post('/api/v1/auth/setup')
      .send({ username: 'mallory', password: TEST_PASSWORD });
    expect(again.status).toBe(409);
    expect(again.body).toEqual({ ok: false, error: 'An account already exists. Log in instead.' });

    const after = await request(ctx.app).get('/api/v1/auth/setup');
    expect(after.body.data).toEqual({ needsSetup: false });
  });

  it('creates a single account when two setups race', async () => {
    const setup = (username: string) =>
      request(ctx.app).post('/api/v1/auth/setup').send({ username, password: TEST_PASSWORD });

    const responses = await Promise.all([setup('alice'), setup('bob')]);

    expect(responses.map((r) => r.status).sort()).toEqual([201, 409]);
    expect(await ctx.store.users.count()).toBe(1);
  });

  it('requires a username and password for setup', async () => {
    const res = await request(ctx.app).post('/api/v1/auth/setup').send({ username: '  ', password: TEST_PASSWORD });
    expect(res.status).toBe(400);
    expect(res.body.meta).toEqual({ type: 'validation' });
  });

  it('rejects bad credentials', async () => {
    await ctx.services.auth.createUser('alice', TEST_PASSWORD);

    const res = await request(ctx.app)
      .post('/api/v1/auth/login')
      .send({ username: 'alice', password: 'wrong-password' });
    expect(res.status).toBe(401);
    expect(res.body).toEqual({ ok: false, error: 'Invalid credentials' });

    const unknown = await request(ctx.app)
      .post('/api/v1/auth/login')
      .send({ username: 'nobody', password: TEST_PASSWORD });
    expect(unknown.status).toBe(401);
  });

  it('issues a long-lived token when remember-me is set', async () => {
    await ctx.services.auth.createUser('alice', TEST_PASSWORD);

    const session = await request(ctx.app)
      .post('/api/v1/auth/login')
      .send({ username: 'alice', password: TEST_PASSWORD });
    expect(session.body.data).toMatchObject({ tokenType: 'Bearer', expiresIn: '12h', username: 'alice' });

    const remembered = await request(ctx.app)
      .post('/api/v1/auth/login')
      .send({ username: 'alice', password: TEST_PASSWORD, rememberMe: true });
    expect(remembered.body.data.expiresIn).toBe('30d');

    const payload = verifyToken(remembered.body.data.token, ctx.config.jwtSecret);
    expect(payload?.username).toBe('alice');
    expect(payload && payload.exp - payload.iat).toBe(30 * 24 * 60 * 60);
  });

  it('identifies the caller from the token', async () => {
    const token = await signIn(ctx, 'alice');

    const res = await request(ctx.app).get('/api/v1/auth/me').set('Authorization', `Bearer ${token}`);
    expect(res.body).toEqual({ ok: true, data: { username: 'alice' } });
  });

  it('rejects a token signed with another secret', async () => {
    const forged = createToken('alice', 'some-other-secret');
    const res = await request(ctx.app).get('/api/v1/auth/me').set('Authorization', `Bearer ${forged}`);
    expect(res.status).toBe(401);
    expect(res.body.error).toBe('Invalid or expired token');
  });

  it('accepts a legacy SHA-256 password once and rehashes it', async () => {
    const legacy = crypto.createHash('sha256').update(TEST_PASSWORD).digest('hex');
    await ctx.store.users.create({ username: 'old-timer', passwordHash: legacy });

    const res = await request(ctx.app)
      .post('/api/v1/auth/login')
      .send({ username: 'old-timer', password: TEST_PASSWORD });
    expect(res.status).toBe(200);

    const stored = await ctx.store.users.findByUsername('old-timer');
    expect(stored?.passwordHash.startsWith('$2')).toBe(true);
  });

  it('changes the password', async () => {
    const token = await signIn(ctx, 'alice');

    const wrong = await request(ctx.app)
      .post('/api/v1/auth/password')
      .set('Authorization', `Bearer ${token}`)
      .send({ currentPassword: 'nope', newPassword: 'new-test-password' });
    expect(wrong.status).toBe(401);

    const ok = await request(ctx.app)
      .post('/api/v1/auth/password')
      .set('Authorization', `Bearer ${token}`)
      .send({ currentPassword: TEST_PASSWORD, newPassword: 'new-test-password' });
    expect(ok.status).toBe(200);

    const login = await request(ctx.app)
      .post('/api/v1/auth/login')
      .send({ username: 'alice', password: 'new-test-password' });
    expect(login.status).toBe(200);
  });

  it('rate limits login attempts', async () => {
    const limited = buildTestApp({ loginRateLimit: { windowMs: 60000, maxRequests: 2 } });
    const attempt = () =>
      request(limited.app).post('/api/v1/auth/login').send({ username: 'alice', password: 'x' });

    expect((await attempt()).status).toBe(401);
    expect((await attempt()).status).toBe(401);
    const blocked = await attempt();
    expect(blocked.status).toBe(429);
    expect(blocked.headers['retry-after']).toBeDefined();
  });
});

describe('bootstrapAdmin', () => {
  it('creates the configured account only on an empty user table', async () => {
    const ctx = buildTestApp();

    expect(await ctx.services.auth.bootstrapAdmin(undefined, undefined)).toBeNull();
    expect(await ctx.services.auth.bootstrapAdmin('admin', TEST_PASSWORD)).toBe('admin');
    expect(await ctx.services.auth.bootstrapAdmin('second', TEST_PASSWORD)).toBeNull();
    expect(await ctx.store.users.count()).toBe(1);
  });
});

describe('tokens', () => {
  it('parses expiry strings', () => {
    expect(parseExpiresIn('30d')).toBe(2592000);
    expect(parseExpiresIn('12h')).toBe(43200);
    expect(parseExpiresIn('15m')).toBe(900);
    expect(parseExpiresIn('45s')).toBe(45);
    expect(parseExpiresIn('soon')).toBe(604800);
  });

  it('expires tokens', () => {
    const token = createToken('alice', 'test-secret', '60s', 1000);
    expect(verifyToken(token, 'test-secret', 1060)).toEqual({ username: 'alice', iat: 1000, exp: 1060 });
    expect(verifyToken(token, 'test-secret', 1061)).toBeNull();
  });

  it('rejects malformed tokens', () => {
    expect(verifyToken('not-a-token', 'test-secret')).toBeNull();
    expect(verifyToken('a.b.c', 'test-secret')).toBeNull();
  });
});
