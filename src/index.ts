// /src/index.ts

import type { AxiosInstance } from 'axios';
import { createApiClient } from '@/lib/apiClient';
import { createAuthApi, type AuthApi } from '@/lib/auth-api';
import { loadConfig, type ClientConfig } from '@/lib/config';
import { setLogLevel } from '@/lib/logger';
import { FileSessionStore, type SessionStore } from '@/lib/session-store';
import { createStatsApi, type StatsApi } from '@/lib/stats-api';
import { TaskCache } from '@/lib/task-cache';
import { TaskListController } from '@/lib/task-list-controller';
import { createTasksApi, type RemoteTaskGateway } from '@/lib/tasks-api';
import { createAppStore, type AppStore } from '@/redux/store';

export interface TasklaneClient {
  config: Readonly<ClientConfig>;
  session: SessionStore;
  http: AxiosInstance;
  tasksApi: RemoteTaskGateway;
  statsApi: StatsApi;
  authApi: AuthApi;
  store: AppStore;
  tasks: TaskListController;
}

/**
 * Wires configuration, session, HTTP client, APIs, store and the task list
 * controller together. Pass a config to skip reading the environment.
 */
export function createTasklaneClient(
  config: Readonly<ClientConfig> = loadConfig(),
  session: SessionStore = new FileSessionStore(config.sessionFile)
): TasklaneClient {
  setLogLevel(config.logLevel);

  const http = createApiClient(config, session);
  const tasksApi = createTasksApi(http, config.pageSize);
  const statsApi = createStatsApi(http);
  const authApi = createAuthApi(http, session);
  const taskCache = new TaskCache();

  const store = createAppStore({ tasksApi, statsApi, authApi, taskCache });
  const tasks = new TaskListController(store, taskCache);

  return { config, session, http, tasksApi, statsApi, authApi, store, tasks };
}

export { loadConfig } from '@/lib/config';
export type { ClientConfig, LogLevel } from '@/lib/config';
export { RemoteFailure, ConfigError, SessionError, describeError } from '@/lib/errors';
export type { OperationFailure } from '@/lib/errors';
export { createLogger, setLogLevel } from '@/lib/logger';
export { FileSessionStore } from '@/lib/session-store';
export type { SessionReader, SessionStore } from '@/lib/session-store';
export { TaskCache } from '@/lib/task-cache';
export { TaskListController } from '@/lib/task-list-controller';
export type { TaskListListener } from '@/lib/task-list-controller';
export { createTasksApi } from '@/lib/tasks-api';
export type { RemoteTaskGateway } from '@/lib/tasks-api';
export { toApiDate, formatForDisplay, describeDueDate, isPastDue } from '@/lib/date-helpers';
export { checkAuthStatus, loginUser, registerUser, logoutUser } from '@/redux/slices/authSlice';
export { loadStatistics, refreshStatistics, selectStatistics } from '@/redux/slices/statsSlice';
export {
  selectTaskListState,
  selectTaskListView,
  selectVisibleTasks,
  selectTaskListError,
} from '@/redux/slices/tasksSlice';
export type {
  TaskListView,
  TasksState,
  NewTask,
  TaskChanges,
  FilterCriteria,
} from '@/redux/slices/tasksSlice';
export type { AppStore, RootState, AppDispatch } from '@/redux/store';
export * from '@/types/tasks';
