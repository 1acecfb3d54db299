// /src/lib/apiClient.ts

import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import type { z } from 'zod';
import type { ClientConfig } from '@/lib/config';
import { RemoteFailure, describeError } from '@/lib/errors';
import { createLogger } from '@/lib/logger';
import { envelopeSchema } from '@/lib/schemas';
import type { SessionReader } from '@/lib/session-store';

const log = createLogger('api-client');

// Pulls the server's own message out of an error body when it sent one
const messageFromBody = (body: unknown): string | undefined => {
  const parsed = envelopeSchema.safeParse(body);
  return parsed.success ? parsed.data.message : undefined;
};

/**
 * Normalizes anything thrown by axios (or by our own checks) into a
 * RemoteFailure. Already-normalized failures pass through untouched.
 */
export const toRemoteFailure = (err: unknown): RemoteFailure => {
  if (err instanceof RemoteFailure) return err;
  if (axios.isAxiosError(err)) {
    const status = err.response?.status;
    const message =
      messageFromBody(err.response?.data) ||
      (status ? `Request failed with status ${status}` : err.message) ||
      'Network error';
    return new RemoteFailure(message, { status, cause: err });
  }
  return new RemoteFailure(describeError(err), { cause: err });
};

// --- Base Setup ---
export const createApiClient = (
  config: Pick<ClientConfig, 'apiBaseUrl' | 'timeoutMs'>,
  session: SessionReader
): AxiosInstance => {
  const apiClient = axios.create({
    baseURL: config.apiBaseUrl,
    timeout: config.timeoutMs,
    headers: { 'Content-Type': 'application/json' },
  });

  // Request interceptor: inject Authorization header from the persisted session.
  apiClient.interceptors.request.use(async (request) => {
    const token = await session.getToken();
    if (token) {
      request.headers.Authorization = `Bearer ${token}`;
    }
    log.debug(
      { method: request.method?.toUpperCase(), url: request.url, params: request.params, authorized: Boolean(token) },
      'API request'
    );
    return request;
  });

  // Response interceptor: log and normalize. No retries, no token refresh.
  apiClient.interceptors.response.use(
    (res) => {
      log.debug({ status: res.status, url: res.config.url }, 'API response');
      return res;
    },
    (err: unknown) => {
      const failure = toRemoteFailure(err);
      log.warn({ status: failure.status, err: failure.message }, 'API error');
      return Promise.reject(failure);
    }
  );

  return apiClient;
};

/**
 * Unwraps a `{ success, data }` envelope and validates `data` against the
 * given schema.
 */
export const readData = <T>(
  response: AxiosResponse<unknown>,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): T => {
  const envelope = envelopeSchema.safeParse(response.data);
  if (!envelope.success) {
    throw new RemoteFailure('Malformed response payload', { status: response.status, cause: envelope.error });
  }
  if (envelope.data.error === true) {
    throw new RemoteFailure(envelope.data.message || 'Request failed', { status: response.status });
  }

  const data = schema.safeParse(envelope.data.data);
  if (!data.success) {
    const issue = data.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new RemoteFailure(`Malformed response payload${where}`, {
      status: response.status,
      cause: data.error,
    });
  }
  return data.data;
};

// For endpoints whose body carries nothing but a possible error flag
export const ensureAccepted = (response: AxiosResponse<unknown>): void => {
  const envelope = envelopeSchema.safeParse(response.data);
  if (envelope.success && envelope.data.error === true) {
    throw new RemoteFailure(envelope.data.message || 'Request failed', { status: response.status });
  }
};
