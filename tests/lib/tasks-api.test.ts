import { describe, it, expect, beforeEach } from 'vitest';
import type { AxiosInstance } from 'axios';
import { createApiClient } from '@/lib/apiClient';
import { RemoteFailure } from '@/lib/errors';
import type { SessionReader } from '@/lib/session-store';
import { createTasksApi, type RemoteTaskGateway } from '@/lib/tasks-api';
import { alice, makeTask } from '../fixtures';
import { stubTransport, type StubbedReply } from '../http-stub';

let token: string | undefined;
const session: SessionReader = {
  getToken: async () => token,
  getCurrentUser: async () => undefined,
};

let http: AxiosInstance;
let api: RemoteTaskGateway;

const reply = (...replies: StubbedReply[]) => stubTransport(http, replies);
const listOf = (...ids: string[]) => ({ success: true, data: { tasks: ids.map(id => makeTask(id)) } });

beforeEach(() => {
  token = 'test-token';
  http = createApiClient({ apiBaseUrl: 'http://tasks.test', timeoutMs: 1000 }, session);
  api = createTasksApi(http, 25);
});

describe('fetchAll', () => {
  it('sends paging and only the filters given', async () => {
    const requests = reply({ data: listOf('a', 'b') });

    const tasks = await api.fetchAll({ status: 'TODO' });

    expect(tasks.map(t => t.id)).toEqual(['a', 'b']);
    expect(requests).toEqual([
      {
        method: 'GET',
        url: '/tasks',
        params: { page: 1, pageSize: 25, status: 'TODO' },
        body: undefined,
        authorization: 'Bearer test-token',
      },
    ]);
  });

  it('omits the Authorization header without a token', async () => {
    token = undefined;
    const requests = reply({ data: listOf() });

    await api.fetchAll();

    expect(requests[0]?.authorization).toBeUndefined();
    expect(requests[0]?.params).toEqual({ page: 1, pageSize: 25 });
  });

  it('turns an error envelope into a RemoteFailure with the server message', async () => {
    reply({ status: 200, data: { error: true, message: 'Session expired' } });
    await expect(api.fetchAll()).rejects.toThrow(new RemoteFailure('Session expired'));
  });

  it('uses the body message of a non-2xx response', async () => {
    reply({ status: 500, data: { error: true, message: 'Database unavailable' } });

    const failure = await api.fetchAll().catch((err: unknown) => err);

    expect(failure).toBeInstanceOf(RemoteFailure);
    expect(failure).toMatchObject({ message: 'Database unavailable', status: 500 });
  });

  it('falls back to the status when the body says nothing', async () => {
    reply({ status: 502, data: '<html>Bad gateway</html>' });
    await expect(api.fetchAll()).rejects.toThrow('Request failed with status 502');
  });

  it('reports network errors', async () => {
    reply({ networkError: true });

    const failure = await api.fetchAll().catch((err: unknown) => err);

    expect(failure).toBeInstanceOf(RemoteFailure);
    expect(failure).toMatchObject({ message: 'Network Error', status: undefined });
  });

  it('rejects a task list with a malformed entry', async () => {
    reply({ data: { success: true, data: { tasks: [{ id: 't1', status: 'TODO' }] } } });
    await expect(api.fetchAll()).rejects.toThrow('Malformed response payload at tasks.0.title');
  });

  it('rejects an empty title', async () => {
    reply({ data: { success: true, data: { tasks: [makeTask('t1', { title: '' })] } } });
    await expect(api.fetchAll()).rejects.toThrow('Malformed response payload at tasks.0.title');
  });

  it('rejects an unknown status value', async () => {
    reply({ data: { success: true, data: { tasks: [{ ...makeTask('t1'), status: 'ARCHIVED' }] } } });
    await expect(api.fetchAll()).rejects.toThrow('Malformed response payload at tasks.0.status');
  });
});

describe('filter', () => {
  it('is a fetch with the filter values', async () => {
    const requests = reply({ data: listOf('a') });

    await api.filter('DONE', 'HIGH');

    expect(requests[0]?.params).toEqual({ page: 1, pageSize: 25, status: 'DONE', priority: 'HIGH' });
  });
});

describe('create', () => {
  it('posts the payload and returns the server task', async () => {
    const created = makeTask('t1', { title: 'Fix bug', assignedTo: alice });
    const requests = reply({ status: 201, data: { success: true, data: created } });

    const task = await api.create({
      title: 'Fix bug',
      description: 'Reproduce and patch',
      dueDate: '2024-06-01',
      priority: 'MEDIUM',
      assignedTo: undefined,
    });

    expect(task).toEqual(created);
    expect(requests[0]).toMatchObject({ method: 'POST', url: '/tasks' });
    expect(requests[0]?.body).toEqual({
      title: 'Fix bug',
      description: 'Reproduce and patch',
      dueDate: '2024-06-01',
      priority: 'MEDIUM',
    });
  });

  it('rejects a response without task data', async () => {
    reply({ status: 201, data: { success: true } });
    await expect(
      api.create({ title: 'x', description: '', dueDate: '2024-06-01', priority: 'LOW' })
    ).rejects.toThrow('Malformed response payload');
  });
});

describe('update', () => {
  it('puts only the supplied fields', async () => {
    const requests = reply({ data: { success: true, data: makeTask('t1', { status: 'DONE' }) } });

    const task = await api.update('t1', { status: 'DONE', title: undefined });

    expect(task.status).toBe('DONE');
    expect(requests[0]).toMatchObject({ method: 'PUT', url: '/tasks/t1', body: { status: 'DONE' } });
  });

  it('escapes the task id in the path', async () => {
    const requests = reply({ data: { success: true, data: makeTask('a/b') } });
    await api.update('a/b', { title: 'x' });
    expect(requests[0]?.url).toBe('/tasks/a%2Fb');
  });
});

describe('delete', () => {
  it('accepts an empty body', async () => {
    const requests = reply({ status: 204, data: '' });
    await expect(api.delete('t1')).resolves.toBeUndefined();
    expect(requests[0]).toMatchObject({ method: 'DELETE', url: '/tasks/t1' });
  });

  it('rejects an error envelope', async () => {
    reply({ data: { error: true, message: 'Task not found' } });
    await expect(api.delete('t1')).rejects.toThrow('Task not found');
  });
});

describe('search', () => {
  it('sends the query with paging', async () => {
    const requests = reply({ data: listOf('b') });

    const tasks = await api.search('bug', { page: 2 });

    expect(tasks.map(t => t.id)).toEqual(['b']);
    expect(requests[0]).toMatchObject({
      url: '/tasks/search',
      params: { q: 'bug', page: 2, pageSize: 25 },
    });
  });
});

describe('getById', () => {
  it('fetches one task', async () => {
    const requests = reply({ data: { success: true, data: makeTask('t9') } });
    const task = await api.getById('t9');
    expect(task.id).toBe('t9');
    expect(requests[0]?.url).toBe('/tasks/t9');
  });
});
