// /src/lib/task-cache.ts

import type { Task, TaskStatus } from '@/types/tasks';

/**
 * The tasks of the current session as last seen from the server, in order.
 * Ids are unique: upsert replaces in place, otherwise appends. Lookups are
 * linear scans, which is plenty for a few hundred tasks.
 */
export class TaskCache {
    private tasks: Task[] = [];

    get size(): number {
        return this.tasks.length;
    }

    replaceAll(tasks: readonly Task[]): void {
        this.tasks = [...tasks];
    }

    upsert(task: Task): void {
        const index = this.tasks.findIndex(t => t.id === task.id);
        if (index !== -1) {
            this.tasks[index] = task;
        } else {
            this.tasks.push(task);
        }
    }

    remove(taskId: string): void {
        this.tasks = this.tasks.filter(t => t.id !== taskId);
    }

    find(taskId: string): Task | undefined {
        return this.tasks.find(t => t.id === taskId);
    }

    // Copy, so callers can't reorder or truncate the cache through it
    all(): Task[] {
        return [...this.tasks];
    }

    byStatus(status: TaskStatus): Task[] {
        return this.tasks.filter(t => t.status === status);
    }
}
