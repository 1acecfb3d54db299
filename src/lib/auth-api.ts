// /src/lib/auth-api.ts
// Login, registration and logout. The persisted session is the only place the token lives.

import type { AxiosInstance } from 'axios';
import { readData } from '@/lib/apiClient';
import { LOGIN_ENDPOINT, REGISTER_ENDPOINT } from '@/lib/config';
import { createLogger } from '@/lib/logger';
import { sessionSchema } from '@/lib/schemas';
import type { SessionStore } from '@/lib/session-store';
import type { User } from '@/types/tasks';

const log = createLogger('auth-api');

export interface AuthApi {
  login(email: string, password: string): Promise<User>;
  register(name: string, email: string, password: string): Promise<User>;
  logout(): Promise<void>;
  getCurrentUser(): Promise<User | undefined>;
  isLoggedIn(): Promise<boolean>;
}

export const createAuthApi = (apiClient: AxiosInstance, session: SessionStore): AuthApi => {
  // Both endpoints answer with { token, user }, which is exactly what gets persisted
  const authenticate = async (path: string, body: Record<string, string>): Promise<User> => {
    const response = await apiClient.post<unknown>(path, body);
    const { token, user } = readData(response, sessionSchema);
    await session.save({ token, user });
    return user;
  };

  return {
    // --- 1. LOGIN ---
    login: async (email, password) => {
      const user = await authenticate(LOGIN_ENDPOINT, { email, password });
      log.info({ userId: user.id }, 'login successful');
      return user;
    },

    // --- 2. REGISTER ---
    register: async (name, email, password) => {
      const user = await authenticate(REGISTER_ENDPOINT, { name, email, password });
      log.info({ userId: user.id }, 'registration successful');
      return user;
    },

    // --- 3. LOGOUT ---
    logout: async () => {
      await session.clear();
    },

    getCurrentUser: () => session.getCurrentUser(),

    isLoggedIn: async () => (await session.getToken()) !== undefined,
  };
};
