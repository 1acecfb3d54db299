// /src/lib/tasks-api.ts

import type { AxiosInstance } from 'axios';
import { ensureAccepted, readData } from '@/lib/apiClient';
import { TASKS_ENDPOINT, TASK_SEARCH_ENDPOINT } from '@/lib/config';
import { createLogger } from '@/lib/logger';
import { taskListSchema, taskSchema } from '@/lib/schemas';
import type {
    CreateTaskPayload,
    PageOptions,
    Task,
    TaskPriority,
    TaskQuery,
    TaskStatus,
    UpdateTaskPayload,
} from '@/types/tasks';

const log = createLogger('tasks-api');

export const DEFAULT_PAGE_SIZE = 10;

/**
 * Everything the task list needs from the server. Every method rejects with
 * a RemoteFailure.
 */
export interface RemoteTaskGateway {
    fetchAll(query?: TaskQuery): Promise<Task[]>;
    filter(status?: TaskStatus, priority?: TaskPriority): Promise<Task[]>;
    getById(taskId: string): Promise<Task>;
    create(payload: CreateTaskPayload): Promise<Task>;
    update(taskId: string, payload: UpdateTaskPayload): Promise<Task>;
    delete(taskId: string): Promise<void>;
    search(query: string, options?: PageOptions): Promise<Task[]>;
}

// Drops keys whose value is undefined so only supplied fields go over the wire
const definedOnly = (payload: object): Record<string, unknown> =>
    Object.fromEntries(
        Object.entries(payload).filter(([, value]) => value !== undefined)
    );

const taskPath = (taskId: string) => `${TASKS_ENDPOINT}/${encodeURIComponent(taskId)}`;

export const createTasksApi = (
    apiClient: AxiosInstance,
    defaultPageSize: number = DEFAULT_PAGE_SIZE
): RemoteTaskGateway => {
    const fetchAll = async ({ status, priority, page = 1, pageSize = defaultPageSize }: TaskQuery = {}): Promise<Task[]> => {
        const params = definedOnly({ page, pageSize, status, priority });
        const response = await apiClient.get<unknown>(TASKS_ENDPOINT, { params });
        const { tasks } = readData(response, taskListSchema);
        log.debug({ count: tasks.length, status, priority }, 'fetched tasks');
        return tasks;
    };

    return {
        fetchAll,

        filter: (status, priority) => fetchAll({ status, priority }),

        getById: async (taskId) => {
            const response = await apiClient.get<unknown>(taskPath(taskId));
            return readData(response, taskSchema);
        },

        create: async (payload) => {
            const response = await apiClient.post<unknown>(TASKS_ENDPOINT, definedOnly(payload));
            const task = readData(response, taskSchema);
            log.debug({ taskId: task.id }, 'task created');
            return task;
        },

        // PUT, but only the fields that were supplied
        update: async (taskId, payload) => {
            const response = await apiClient.put<unknown>(taskPath(taskId), definedOnly(payload));
            return readData(response, taskSchema);
        },

        delete: async (taskId) => {
            const response = await apiClient.delete<unknown>(taskPath(taskId));
            ensureAccepted(response);
        },

        search: async (query, { page = 1, pageSize = defaultPageSize } = {}) => {
            const response = await apiClient.get<unknown>(TASK_SEARCH_ENDPOINT, {
                params: { q: query, page, pageSize },
            });
            return readData(response, taskListSchema).tasks;
        },
    };
};
