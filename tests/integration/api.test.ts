import jwt from 'jsonwebtoken';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { startTestServer, jsonRequest, TestServer } from '../helpers/test-server';
import { stringProp } from '../helpers/json';
import { TEST_SIGNING_KEY, createTestConfig } from '../helpers/test-config';
import { createServices } from '../../src/app';
import { AuthService } from '../../src/services/auth.service';
import { CredentialService } from '../../src/services/credential.service';
import { UserStore } from '../../src/stores/store.types';
import { User } from '../../src/types/user.types';

const INVALID_CREDENTIALS = {
  error: 'InvalidCredentialsError',
  message: 'The username or password is invalid.',
  statusCode: 401,
};

const TOKEN_REJECTED = {
  error: 'TokenRejectedError',
  message: 'Authentication failed due to invalid or missing token.',
  statusCode: 401,
};

describe('HTTP API', () => {
  let server: TestServer;

  const call = (path: string, init?: RequestInit) => fetch(`${server.baseUrl}${path}`, init);

  async function registerAndLogin(username = 'alice', password = 'password'): Promise<string> {
    await call('/auth/register', jsonRequest('POST', { username, password }));
    const res = await call('/auth/login', jsonRequest('POST', { username, password }));
    return stringProp(await res.json(), 'token');
  }

  beforeEach(async () => {
    server = await startTestServer();
  });

  afterEach(async () => {
    await server.close();
  });

  describe('public endpoints', () => {
    it('serves health without a token', async () => {
      const res = await call('/health');

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ status: 'ok' });
    });

    it('returns 404 for unknown routes', async () => {
      const res = await call('/nope');

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({
        error: 'NotFoundError',
        message: 'Route not found: GET /nope',
        statusCode: 404,
      });
    });
  });

  describe('registration and login', () => {
    it('registers a user', async () => {
      const res = await call('/auth/register', jsonRequest('POST', { username: 'alice', password: 'password' }));

      expect(res.status).toBe(201);
      expect(await res.json()).toEqual({ message: 'User registered successfully.', username: 'alice' });
    });

    it('rejects a duplicate registration with 409', async () => {
      await call('/auth/register', jsonRequest('POST', { username: 'alice', password: 'password' }));
      const res = await call('/auth/register', jsonRequest('POST', { username: 'alice', password: 'other' }));

      expect(res.status).toBe(409);
      expect(await res.json()).toEqual({
        error: 'IdentityAlreadyExistsError',
        message: 'User "alice" already exists.',
        statusCode: 409,
      });
    });

    it('rejects a request without a password with 400', async () => {
      const res = await call('/auth/login', jsonRequest('POST', { username: 'alice' }));

      expect(res.status).toBe(400);
      expect(stringProp(await res.json(), 'error')).toBe('BadRequestError');
    });

    it('rejects malformed JSON with 400', async () => {
      const res = await call('/auth/login', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: '{"username":',
      });

      expect(res.status).toBe(400);
      expect(stringProp(await res.json(), 'error')).toBe('BadRequestError');
    });

    it('issues an HS512 token for valid credentials', async () => {
      await call('/auth/register', jsonRequest('POST', { username: 'alice', password: 'password' }));
      const res = await call('/auth/login', jsonRequest('POST', { username: 'alice', password: 'password' }));
      const body: unknown = await res.json();

      expect(res.status).toBe(200);
      expect(body).toMatchObject({ tokenType: 'Bearer', expiresIn: 3600 });

      const payload = jwt.verify(stringProp(body, 'token'), TEST_SIGNING_KEY, { algorithms: ['HS512'] });
      expect(typeof payload === 'string' ? null : payload.sub).toBe('alice');
    });

    it('does not reveal whether the user or the password was wrong', async () => {
      await call('/auth/register', jsonRequest('POST', { username: 'alice', password: 'password' }));

      const wrongPassword = await call('/auth/login', jsonRequest('POST', { username: 'alice', password: 'wrong' }));
      const unknownUser = await call('/auth/login', jsonRequest('POST', { username: 'bob', password: 'password' }));

      expect(wrongPassword.status).toBe(401);
      expect(unknownUser.status).toBe(401);
      expect(await wrongPassword.json()).toEqual(INVALID_CREDENTIALS);
      expect(await unknownUser.json()).toEqual(INVALID_CREDENTIALS);
    });

    it('reports the identity behind a token', async () => {
      const token = await registerAndLogin();

      const res = await call('/auth/me', jsonRequest('GET', undefined, token));

      expect(res.status).toBe(200);
      expect(stringProp(await res.json(), 'username')).toBe('alice');
    });

    it('lists registered users without credential material', async () => {
      const token = await registerAndLogin();

      const res = await call('/auth/users', jsonRequest('GET', undefined, token));
      const body: unknown = await res.json();

      expect(res.status).toBe(200);
      expect(body).toEqual([{ username: 'alice', createdAt: expect.any(String) }]);
    });
  });

  describe('authorization gate', () => {
    it('rejects requests without a token', async () => {
      const res = await call('/students');

      expect(res.status).toBe(401);
      expect(await res.json()).toEqual(TOKEN_REJECTED);
    });

    it('rejects a token signed with another key', async () => {
      const forged = jwt.sign(
        { sub: 'alice', exp: Math.floor(Date.now() / 1000) + 60 },
        'another-test-secret-another-test-secret',
        { algorithm: 'HS512' }
      );

      const res = await call('/students', jsonRequest('GET', undefined, forged));

      expect(res.status).toBe(401);
      expect(await res.json()).toEqual(TOKEN_REJECTED);
    });

    it('rejects an expired token', async () => {
      const now = Math.floor(Date.now() / 1000);
      const expired = jwt.sign({ sub: 'alice', iat: now - 120, exp: now - 60 }, TEST_SIGNING_KEY, {
        algorithm: 'HS512',
      });

      const res = await call('/students', jsonRequest('GET', undefined, expired));

      expect(res.status).toBe(401);
    });

    it('accepts the token in X-Authorization', async () => {
      const token = await registerAndLogin();

      const res = await call('/students', { headers: { 'X-Authorization': `bearer ${token}` } });

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual([]);
    });
  });

  describe('students and assignments', () => {
    it('runs the full CRUD lifecycle', async () => {
      const token = await registerAndLogin();

      const created = await call(
        '/students',
        jsonRequest('POST', { firstName: 'Ada', lastName: 'Lovelace', email: 'ada@example.test' }, token)
      );
      const student: unknown = await created.json();
      const studentId = stringProp(student, 'id');

      expect(created.status).toBe(201);
      expect(created.headers.get('location')).toBe(`/students/${studentId}`);
      expect(student).toMatchObject({ firstName: 'Ada', lastName: 'Lovelace', email: 'ada@example.test' });

      const assignmentRes = await call(
        '/assignments',
        jsonRequest('POST', { studentId, title: 'Essay', dueDate: '2024-10-01' }, token)
      );
      const assignmentId = stringProp(await assignmentRes.json(), 'id');
      expect(assignmentRes.status).toBe(201);

      const forStudent = await call(`/students/${studentId}/assignments`, jsonRequest('GET', undefined, token));
      expect(await forStudent.json()).toMatchObject([
        { id: assignmentId, studentId, title: 'Essay', description: '', completed: false },
      ]);

      const updated = await call(
        `/assignments/${assignmentId}`,
        jsonRequest('PUT', { studentId, title: 'Essay', dueDate: '2024-10-01', completed: true }, token)
      );
      expect(updated.status).toBe(200);
      expect(await updated.json()).toMatchObject({ id: assignmentId, completed: true });

      const renamed = await call(
        `/students/${studentId}`,
        jsonRequest('PUT', { firstName: 'Augusta', lastName: 'King', email: 'ada@example.test' }, token)
      );
      expect(await renamed.json()).toMatchObject({ id: studentId, firstName: 'Augusta', lastName: 'King' });

      const deleted = await call(`/students/${studentId}`, jsonRequest('DELETE', undefined, token));
      expect(deleted.status).toBe(204);

      const missing = await call(`/students/${studentId}`, jsonRequest('GET', undefined, token));
      expect(missing.status).toBe(404);
      expect(await missing.json()).toEqual({
        error: 'NotFoundError',
        message: `Student not found: ${studentId}`,
        statusCode: 404,
      });
    });

    it('returns 404 for the assignments of an unknown student', async () => {
      const token = await registerAndLogin();

      const res = await call('/students/unknown/assignments', jsonRequest('GET', undefined, token));

      expect(res.status).toBe(404);
    });

    it('deletes an assignment', async () => {
      const token = await registerAndLogin();
      const created = await call('/assignments', jsonRequest('POST', { title: 'Quiz' }, token));
      const id = stringProp(await created.json(), 'id');

      const deleted = await call(`/assignments/${id}`, jsonRequest('DELETE', undefined, token));
      const list = await call('/assignments', jsonRequest('GET', undefined, token));

      expect(deleted.status).toBe(204);
      expect(await list.json()).toEqual([]);
    });
  });
});

describe('HTTP API error surfaces', () => {
  let server: TestServer | undefined;

  afterEach(async () => {
    await server?.close();
    server = undefined;
  });

  it('answers the third login inside the window with 429', async () => {
    server = await startTestServer(createTestConfig({}, { authMax: 2 }));
    const baseUrl = server.baseUrl;
    const login = () =>
      fetch(`${baseUrl}/auth/login`, jsonRequest('POST', { username: 'alice', password: 'wrong' }));

    const first = await login();
    const second = await login();
    const third = await login();

    expect([first.status, second.status, third.status]).toEqual([401, 401, 429]);
    expect(await third.json()).toEqual({
      error: 'TooManyRequestsError',
      message: 'Too many authentication attempts. Please slow down.',
      statusCode: 429,
    });
  });

  it('answers a login against a corrupt stored record with a generic 500', async () => {
    const corrupt: User = {
      username: 'carol',
      passwordHash: Buffer.alloc(10, 1),
      passwordSalt: Buffer.alloc(64, 2),
      createdAt: new Date('2024-01-01T00:00:00.000Z'),
    };
    const corruptStore: UserStore = {
      findByIdentity: async (username) => (username === 'carol' ? corrupt : null),
      insert: async () => undefined,
      listAll: async () => [corrupt],
    };
    const appConfig = createTestConfig();
    const services = createServices(appConfig);
    server = await startTestServer(appConfig, {
      ...services,
      authService: new AuthService(corruptStore, new CredentialService(), services.tokenService),
    });

    const res = await fetch(
      `${server.baseUrl}/auth/login`,
      jsonRequest('POST', { username: 'carol', password: 'password' })
    );

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      error: 'InternalServerError',
      message: 'The request failed due to internal server error.',
      statusCode: 500,
    });
  });
});
