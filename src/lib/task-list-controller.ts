// /src/lib/task-list-controller.ts

import { createLogger } from '@/lib/logger';
import type { TaskCache } from '@/lib/task-cache';
import type { AppStore } from '@/redux/store';
import { logoutUser } from '@/redux/slices/authSlice';
import {
    createTask,
    deleteTask,
    filterTasks,
    loadTasks,
    refreshTasks,
    resetTasks,
    searchTasks,
    updateTask,
    updateTaskStatus,
    type NewTask,
    type TaskChanges,
    type TasksState,
} from '@/redux/slices/tasksSlice';
import type { Task, TaskPriority, TaskStatus } from '@/types/tasks';

const log = createLogger('task-list');

export type TaskListListener = (state: TasksState) => void;

/**
 * One method per user intent over the shared store. Intents run strictly
 * one after another: each finishes its remote call and cache mutation
 * before the next one starts, whether or not the caller awaited it.
 *
 * Every intent resolves with the task-list state it ended in.
 */
export class TaskListController {
    private queue: Promise<unknown> = Promise.resolve();

    constructor(
        private readonly store: AppStore,
        private readonly cache: TaskCache
    ) {}

    private enqueue(intent: string, run: () => Promise<unknown>): Promise<TasksState> {
        const next = this.queue.then(async () => {
            log.debug({ intent }, 'intent started');
            await run();
            const state = this.getState();
            log.debug({ intent, status: state.status }, 'intent finished');
            return state;
        });
        // A failed intent must not stall the ones queued behind it; the caller still sees the rejection
        this.queue = next.catch((err: unknown) => log.error({ err, intent }, 'intent threw'));
        return next;
    }

    getState(): TasksState {
        return this.store.getState().tasks;
    }

    /**
     * Calls the listener once for every state the task list moves through,
     * in order. Dispatches that leave the task list untouched are skipped.
     */
    subscribe(listener: TaskListListener): () => void {
        let last = this.getState();
        return this.store.subscribe(() => {
            const current = this.getState();
            if (current !== last) {
                last = current;
                listener(current);
            }
        });
    }

    // --- Intents ---

    load(): Promise<TasksState> {
        return this.enqueue('load', () => this.store.dispatch(loadTasks()));
    }

    refresh(): Promise<TasksState> {
        return this.enqueue('refresh', () => this.store.dispatch(refreshTasks()));
    }

    create(task: NewTask): Promise<TasksState> {
        return this.enqueue('create', () => this.store.dispatch(createTask(task)));
    }

    update(id: string, changes: TaskChanges): Promise<TasksState> {
        return this.enqueue('update', () => this.store.dispatch(updateTask({ id, changes })));
    }

    delete(id: string): Promise<TasksState> {
        return this.enqueue('delete', () => this.store.dispatch(deleteTask(id)));
    }

    updateStatus(id: string, status: TaskStatus): Promise<TasksState> {
        return this.enqueue('updateStatus', () => this.store.dispatch(updateTaskStatus({ id, status })));
    }

    search(query: string): Promise<TasksState> {
        return this.enqueue('search', () => this.store.dispatch(searchTasks(query)));
    }

    filter(status?: TaskStatus, priority?: TaskPriority): Promise<TasksState> {
        return this.enqueue('filter', () => this.store.dispatch(filterTasks({ status, priority })));
    }

    // Drops the cache and the view; the next load starts from scratch
    reset(): Promise<TasksState> {
        return this.enqueue('reset', async () => {
            this.cache.replaceAll([]);
            this.store.dispatch(resetTasks());
        });
    }

    logout(): Promise<TasksState> {
        return this.enqueue('logout', () => this.store.dispatch(logoutUser()));
    }

    // --- Synchronous reads of the cache ---

    getById(id: string): Task | undefined {
        return this.cache.find(id);
    }

    getAll(): Task[] {
        return this.cache.all();
    }

    getByStatus(status: TaskStatus): Task[] {
        return this.cache.byStatus(status);
    }
}
