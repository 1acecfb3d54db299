import { describe, it, expect, beforeEach } from 'vitest';
import type { AxiosInstance } from 'axios';
import { createApiClient } from '@/lib/apiClient';
import { createAuthApi, type AuthApi } from '@/lib/auth-api';
import { MemorySessionStore } from '../fakes';
import { alice } from '../fixtures';
import { stubTransport } from '../http-stub';

let session: MemorySessionStore;
let http: AxiosInstance;
let auth: AuthApi;

beforeEach(() => {
  session = new MemorySessionStore();
  http = createApiClient({ apiBaseUrl: 'http://tasks.test', timeoutMs: 1000 }, session);
  auth = createAuthApi(http, session);
});

describe('login', () => {
  it('persists the token and user', async () => {
    const requests = stubTransport(http, [{ data: { success: true, data: { token: 'test-token', user: alice } } }]);

    const user = await auth.login('alice@example.com', 'test-password');

    expect(user).toEqual(alice);
    expect(session.current).toEqual({ token: 'test-token', user: alice });
    expect(requests[0]).toMatchObject({
      method: 'POST',
      url: '/auth/login',
      body: { email: 'alice@example.com', password: 'test-password' },
      authorization: undefined,
    });
    expect(await auth.isLoggedIn()).toBe(true);
  });

  it('keeps the session empty when credentials are refused', async () => {
    stubTransport(http, [{ status: 401, data: { error: true, message: 'Invalid credentials' } }]);

    await expect(auth.login('alice@example.com', 'wrong')).rejects.toThrow('Invalid credentials');
    expect(session.current).toBeUndefined();
    expect(await auth.isLoggedIn()).toBe(false);
  });

  it('sends the stored token on later requests', async () => {
    const requests = stubTransport(http, [
      { data: { success: true, data: { token: 'test-token', user: alice } } },
      { data: { success: true, data: { tasks: [] } } },
    ]);

    await auth.login('alice@example.com', 'test-password');
    await http.get('/tasks');

    expect(requests[1]?.authorization).toBe('Bearer test-token');
  });
});

describe('register', () => {
  it('posts the new account and persists the session', async () => {
    const requests = stubTransport(http, [{ status: 201, data: { success: true, data: { token: 'test-token', user: alice } } }]);

    await auth.register('Alice Example', 'alice@example.com', 'test-password');

    expect(requests[0]?.url).toBe('/auth/register');
    expect(requests[0]?.body).toEqual({ name: 'Alice Example', email: 'alice@example.com', password: 'test-password' });
    expect(await auth.getCurrentUser()).toEqual(alice);
  });
});

describe('logout', () => {
  it('clears the session', async () => {
    await session.save({ token: 'test-token', user: alice });
    await auth.logout();
    expect(await auth.getCurrentUser()).toBeUndefined();
  });
});
