// /src/redux/services.ts

import type { AuthApi } from '@/lib/auth-api';
import type { StatsApi } from '@/lib/stats-api';
import type { TaskCache } from '@/lib/task-cache';
import type { RemoteTaskGateway } from '@/lib/tasks-api';
import type { OperationFailure } from '@/lib/errors';

// Handed to every thunk as `extra`
export interface AppServices {
    tasksApi: RemoteTaskGateway;
    statsApi: StatsApi;
    authApi: AuthApi;
    taskCache: TaskCache;
}

export interface ThunkConfig<S> {
    state: S;
    extra: AppServices;
    rejectValue: OperationFailure;
}
