import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import request from 'supertest';
import {
  createUser,
  loginAs,
  setupTestApp,
  teardownTestApp,
  TEST_PASSWORD,
  type TestContext,
} from '../../test/test-app.js';
import { SESSION_COOKIE_NAME } from '../../middleware/session.js';

describe('Auth Routes', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = setupTestApp();
  });

  afterEach(() => {
    teardownTestApp(ctx);
  });

  describe('POST /auth/register', () => {
    it('should create an account and send the user to the login page', async () => {
      const response = await request(ctx.app)
        .post('/auth/register')
        .type('form')
        .send({ username: 'alice', email: 'Alice@Example.com', password: TEST_PASSWORD, password2: TEST_PASSWORD });

      expect(response.status).toBe(303);
      expect(response.headers['location']).toBe('/auth/login');
      expect(ctx.services.repositories.users.findByEmail('alice@example.com')?.username).toBe('alice');
    });

    it('should answer JSON clients with the new user', async () => {
      const response = await request(ctx.app)
        .post('/auth/register')
        .send({ username: 'alice', email: 'alice@example.com', password: TEST_PASSWORD, password2: TEST_PASSWORD });

      expect(response.status).toBe(201);
      expect(response.body.data).toMatchObject({ username: 'alice', email: 'alice@example.com' });
      expect(response.body.data).not.toHaveProperty('password_hash');
    });

    it('should reject mismatched passwords', async () => {
      const response = await request(ctx.app)
        .post('/auth/register')
        .send({ username: 'alice', email: 'alice@example.com', password: TEST_PASSWORD, password2: 'different1' });

      expect(response.status).toBe(400);
      expect(response.body.error.details[0].message).toBe('Passwords do not match');
    });

    it('should reject a taken username with 409', async () => {
      await createUser(ctx, 'alice');

      const response = await request(ctx.app)
        .post('/auth/register')
        .send({ username: 'alice', email: 'new@example.com', password: TEST_PASSWORD, password2: TEST_PASSWORD });

      expect(response.status).toBe(409);
    });

    it('should answer concurrent signups for one name with 201 and 409', async () => {
      const signup = (email: string) =>
        request(ctx.app)
          .post('/auth/register')
          .send({ username: 'carol', email, password: TEST_PASSWORD, password2: TEST_PASSWORD });

      const responses = await Promise.all([signup('carol@example.com'), signup('carol2@example.com')]);

      expect(responses.map((response) => response.status).sort()).toEqual([201, 409]);
    });
  });

  describe('POST /auth/login', () => {
    it('should start a session and follow a local next target', async () => {
      await createUser(ctx, 'alice');
      const agent = request.agent(ctx.app);

      const response = await agent
        .post('/auth/login')
        .type('form')
        .send({ username: 'alice', password: TEST_PASSWORD, next: '/table' });

      expect(response.status).toBe(303);
      expect(response.headers['location']).toBe('/table');
      expect(response.headers['set-cookie']?.[0]).toContain(`${SESSION_COOKIE_NAME}=`);
      expect((await agent.get('/table')).status).toBe(200);
    });

    it('should not follow targets on other sites', async () => {
      await createUser(ctx, 'alice');

      const response = await request(ctx.app)
        .post('/auth/login')
        .type('form')
        .send({ username: 'alice', password: TEST_PASSWORD, next: '//evil.example.com' });

      expect(response.headers['location']).toBe('/');
    });

    it('should not follow backslash targets from a plain form', async () => {
      await createUser(ctx, 'alice');

      const response = await request(ctx.app)
        .post('/auth/login')
        .type('form')
        .send({ username: 'alice', password: TEST_PASSWORD, next: '/\\evil.example.com' });

      expect(response.status).toBe(303);
      expect(response.headers['location']).toBe('/');
    });

    it('should not send htmx clients to backslash targets', async () => {
      await createUser(ctx, 'alice');

      const response = await request(ctx.app)
        .post('/auth/login')
        .set('HX-Request', 'true')
        .type('form')
        .send({ username: 'alice', password: TEST_PASSWORD, next: '/\\evil.example.com' });

      expect(response.status).toBe(204);
      expect(response.headers['hx-redirect']).toBe('/');
    });

    it('should reject a wrong password with 401', async () => {
      await createUser(ctx, 'alice');

      const response = await request(ctx.app)
        .post('/auth/login')
        .send({ username: 'alice', password: 'wrong-password' });

      expect(response.status).toBe(401);
      expect(response.body.error.message).toBe('Invalid username or password');
    });

    it('should send a failed form login back with a flash', async () => {
      await createUser(ctx, 'alice');
      const agent = request.agent(ctx.app);

      const response = await agent
        .post('/auth/login')
        .type('form')
        .send({ username: 'alice', password: 'wrong-password' });

      expect(response.status).toBe(303);
      expect(response.headers['location']).toBe('/auth/login');
      expect((await agent.get('/auth/login')).text).toContain('Invalid username or password');
    });
  });

  describe('POST /auth/logout', () => {
    it('should end the session', async () => {
      const { agent } = await loginAs(ctx, 'alice');

      const response = await agent.post('/auth/logout');

      expect(response.status).toBe(303);
      expect(response.headers['location']).toBe('/auth/login');
      expect((await agent.get('/table')).status).toBe(303);
    });
  });

  describe('/settings', () => {
    it('should require a login', async () => {
      const response = await request(ctx.app).get('/settings');

      expect(response.status).toBe(303);
      expect(response.headers['location']).toBe('/auth/login?next=%2Fsettings');
    });

    it('should save the profile', async () => {
      const { agent, user } = await loginAs(ctx, 'alice');

      const response = await agent
        .post('/settings')
        .send({ first_name: 'Alice', last_name: '', email: 'alice@example.com', language: 'fr' });

      expect(response.status).toBe(200);
      expect(response.body.data).toMatchObject({ first_name: 'Alice', last_name: null, language: 'fr' });
      expect(ctx.services.auth.getUser(user.id)?.language).toBe('fr');
    });

    it('should change the password', async () => {
      const { agent } = await loginAs(ctx, 'alice');

      const response = await agent.post('/settings/password').send({
        old_password: TEST_PASSWORD,
        new_password: 'another-password',
        confirm_password: 'another-password',
      });

      expect(response.status).toBe(200);
      await expect(ctx.services.auth.login('alice', 'another-password')).resolves.toMatchObject({
        username: 'alice',
      });
    });
  });
});
