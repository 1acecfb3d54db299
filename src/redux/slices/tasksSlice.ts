// /src/redux/slices/tasksSlice.ts

import {
    createAsyncThunk,
    createSlice,
    isFulfilled,
    isRejected,
    type PayloadAction,
} from '@reduxjs/toolkit';
import { toApiDate } from '@/lib/date-helpers';
import { operationFailure } from '@/lib/errors';
import { createLogger } from '@/lib/logger';
import type { AppServices, ThunkConfig } from '@/redux/services';
import { logoutUser } from '@/redux/slices/authSlice';
import type {
    Task,
    TaskPriority,
    TaskStatus,
    UpdateTaskPayload,
} from '@/types/tasks';

const log = createLogger('tasks');

/**
 * The full list as of the last sync plus the narrowed subset on screen.
 * `filtered` is only recomputed by a search or filter intent; mutations
 * reset it to the full list.
 */
export interface TaskListView {
    full: Task[];
    filtered: Task[];
    activeStatusFilter: TaskStatus | null;
    activePriorityFilter: TaskPriority | null;
    activeSearchQuery: string | null;
}

/**
 * initial → loading → loaded | error, and loaded → acknowledged → loaded
 * for every successful mutation. The last view survives errors.
 */
export type TasksState =
    | { status: 'initial'; view: null }
    | { status: 'loading'; view: TaskListView | null }
    | { status: 'loaded'; view: TaskListView }
    | { status: 'acknowledged'; view: TaskListView | null; message: string }
    | { status: 'error'; view: TaskListView | null; message: string; reason: string };

export type TaskListStatus = TasksState['status'];

const initialTasksState = (): TasksState => ({ status: 'initial', view: null });

type TasksThunkConfig = ThunkConfig<{ tasks: TasksState }>;

export interface NewTask {
    title: string;
    description: string;
    priority: TaskPriority;
    dueDate: Date | string;
    assignedTo?: string;
}

export interface TaskChanges {
    title?: string;
    description?: string;
    status?: TaskStatus;
    priority?: TaskPriority;
    dueDate?: Date | string;
    assignedTo?: string;
}

export interface FilterCriteria {
    status?: TaskStatus;
    priority?: TaskPriority;
}

export interface NarrowedTasks {
    filtered: Task[];
    criteria: FilterCriteria;
    fallback: boolean;
}

export const freshView = (tasks: Task[]): TaskListView => ({
    full: tasks,
    filtered: tasks,
    activeStatusFilter: null,
    activePriorityFilter: null,
    activeSearchQuery: null,
});

// Conjunctive: a task must match every criterion that is set
export const matchesCriteria = (task: Task, { status, priority }: FilterCriteria): boolean =>
    (status === undefined || task.status === status) &&
    (priority === undefined || task.priority === priority);

const hasView = (getState: () => { tasks: TasksState }): boolean => getState().tasks.view !== null;

// --- ASYNCHRONOUS THUNKS ---

const fetchIntoCache = async ({ tasksApi, taskCache }: AppServices): Promise<Task[]> => {
    const tasks = await tasksApi.fetchAll();
    taskCache.replaceAll(tasks);
    log.debug({ count: tasks.length }, 'task cache replaced');
    return taskCache.all();
};

export const loadTasks = createAsyncThunk<Task[], void, TasksThunkConfig>(
    'tasks/loadTasks',
    async (_, { extra, rejectWithValue }) => {
        try {
            return await fetchIntoCache(extra);
        } catch (error) {
            return rejectWithValue(operationFailure('Failed to load tasks', error));
        }
    }
);

// Same as loadTasks, but no pending case is handled, so there is no loading flicker
export const refreshTasks = createAsyncThunk<Task[], void, TasksThunkConfig>(
    'tasks/refreshTasks',
    async (_, { extra, rejectWithValue }) => {
        try {
            return await fetchIntoCache(extra);
        } catch (error) {
            return rejectWithValue(operationFailure('Failed to refresh tasks', error));
        }
    }
);

export const createTask = createAsyncThunk<Task[], NewTask, TasksThunkConfig>(
    'tasks/createTask',
    async ({ title, description, priority, dueDate, assignedTo }, { extra, dispatch, rejectWithValue }) => {
        let created: Task;
        try {
            created = await extra.tasksApi.create({
                title,
                description,
                priority,
                dueDate: toApiDate(dueDate),
                assignedTo,
            });
        } catch (error) {
            return rejectWithValue(operationFailure('Failed to create task', error));
        }
        extra.taskCache.upsert(created);
        dispatch(operationAcknowledged('Task created successfully!'));
        return extra.taskCache.all();
    }
);

const toUpdatePayload = ({ dueDate, ...fields }: TaskChanges): UpdateTaskPayload =>
    dueDate === undefined ? fields : { ...fields, dueDate: toApiDate(dueDate) };

export const updateTask = createAsyncThunk<Task[], { id: string; changes: TaskChanges }, TasksThunkConfig>(
    'tasks/updateTask',
    async ({ id, changes }, { extra, dispatch, rejectWithValue }) => {
        let updated: Task;
        try {
            updated = await extra.tasksApi.update(id, toUpdatePayload(changes));
        } catch (error) {
            return rejectWithValue(operationFailure('Failed to update task', error));
        }
        if (!extra.taskCache.find(updated.id)) {
            log.warn({ taskId: updated.id }, 'updated task was not cached, appending it');
        }
        extra.taskCache.upsert(updated);
        dispatch(operationAcknowledged('Task updated successfully!'));
        return extra.taskCache.all();
    }
);

export const updateTaskStatus = createAsyncThunk<Task[], { id: string; status: TaskStatus }, TasksThunkConfig>(
    'tasks/updateTaskStatus',
    async ({ id, status }, { extra, dispatch, rejectWithValue }) => {
        let updated: Task;
        try {
            updated = await extra.tasksApi.update(id, { status });
        } catch (error) {
            return rejectWithValue(operationFailure('Failed to update task status', error));
        }
        if (!extra.taskCache.find(updated.id)) {
            log.warn({ taskId: updated.id }, 'updated task was not cached, appending it');
        }
        extra.taskCache.upsert(updated);
        dispatch(operationAcknowledged('Task status updated successfully!'));
        return extra.taskCache.all();
    }
);

// No optimistic removal: the task leaves the cache only once the server confirms
export const deleteTask = createAsyncThunk<Task[], string, TasksThunkConfig>(
    'tasks/deleteTask',
    async (taskId, { extra, dispatch, rejectWithValue }) => {
        try {
            await extra.tasksApi.delete(taskId);
        } catch (error) {
            return rejectWithValue(operationFailure('Failed to delete task', error));
        }
        extra.taskCache.remove(taskId);
        dispatch(operationAcknowledged('Task deleted successfully!'));
        return extra.taskCache.all();
    }
);

// Full-text search lives on the server; an empty query restores the full list
export const searchTasks = createAsyncThunk<{ filtered: Task[]; query: string | null }, string, TasksThunkConfig>(
    'tasks/searchTasks',
    async (query, { extra, rejectWithValue }) => {
        if (query === '') {
            return { filtered: extra.taskCache.all(), query: null };
        }
        try {
            return { filtered: await extra.tasksApi.search(query), query };
        } catch (error) {
            return rejectWithValue(operationFailure('Failed to search tasks', error));
        }
    },
    { condition: (_, { getState }) => hasView(getState) }
);

/**
 * Asks the server first. If that fails for any reason, narrows the cache
 * locally instead; this thunk never rejects.
 */
export const filterTasks = createAsyncThunk<NarrowedTasks, FilterCriteria, TasksThunkConfig>(
    'tasks/filterTasks',
    async (criteria, { extra }) => {
        try {
            const filtered = await extra.tasksApi.filter(criteria.status, criteria.priority);
            return { filtered, criteria, fallback: false };
        } catch (error) {
            log.warn({ err: error, ...criteria }, 'server-side filter failed, filtering cached tasks');
            const filtered = extra.taskCache.all().filter(task => matchesCriteria(task, criteria));
            return { filtered, criteria, fallback: true };
        }
    },
    { condition: (_, { getState }) => hasView(getState) }
);

const mutations = [createTask, updateTask, updateTaskStatus, deleteTask] as const;

// --- SELECTORS (derived, not stored) ---
export const selectTaskListState = (state: { tasks: TasksState }): TasksState => state.tasks;
export const selectTaskListView = (state: { tasks: TasksState }): TaskListView | null => state.tasks.view;
export const selectVisibleTasks = (state: { tasks: TasksState }): Task[] => state.tasks.view?.filtered ?? [];
export const selectTaskListError = (state: { tasks: TasksState }): string | null =>
    state.tasks.status === 'error' ? state.tasks.message : null;

// --- SLICE DEFINITION ---
const tasksSlice = createSlice({
    name: 'tasks',
    initialState: initialTasksState,
    reducers: {
        operationAcknowledged: (state, action: PayloadAction<string>): TasksState => ({
            status: 'acknowledged',
            view: state.view,
            message: action.payload,
        }),
        resetTasks: () => initialTasksState(),
    },
    extraReducers: (builder) => {
        builder
            .addCase(loadTasks.pending, (state): TasksState => ({ status: 'loading', view: state.view }))
            .addCase(loadTasks.fulfilled, (_state, action): TasksState => ({
                status: 'loaded',
                view: freshView(action.payload),
            }))
            .addCase(refreshTasks.fulfilled, (_state, action): TasksState => ({
                status: 'loaded',
                view: freshView(action.payload),
            }))

            .addCase(searchTasks.fulfilled, (state, action): TasksState => {
                if (state.view === null) return state;
                return {
                    status: 'loaded',
                    view: {
                        ...state.view,
                        filtered: action.payload.filtered,
                        activeSearchQuery: action.payload.query,
                    },
                };
            })

            .addCase(filterTasks.fulfilled, (state, action): TasksState => {
                if (state.view === null) return state;
                const { filtered, criteria } = action.payload;
                return {
                    status: 'loaded',
                    view: {
                        ...state.view,
                        filtered,
                        activeStatusFilter: criteria.status ?? null,
                        activePriorityFilter: criteria.priority ?? null,
                    },
                };
            })

            .addCase(logoutUser.fulfilled, () => initialTasksState())
            .addCase(logoutUser.rejected, () => initialTasksState())

            // Mutations always come back to the full list with criteria cleared
            .addMatcher(
                isFulfilled(...mutations),
                (_state, action): TasksState => ({
                    status: 'loaded',
                    view: freshView(action.payload),
                })
            )

            .addMatcher(
                isRejected(loadTasks, refreshTasks, searchTasks, ...mutations),
                (state, action): TasksState => ({
                    status: 'error',
                    view: state.view,
                    message: action.payload?.message ?? action.error.message ?? 'Task operation failed',
                    reason: action.payload?.reason ?? action.error.message ?? 'unknown error',
                })
            );
    },
});

export const { operationAcknowledged, resetTasks } = tasksSlice.actions;
export default tasksSlice.reducer;
