// /src/types/tasks.ts

export const TASK_STATUSES = ['TODO', 'IN_PROGRESS', 'DONE'] as const;
export const TASK_PRIORITIES = ['LOW', 'MEDIUM', 'HIGH'] as const;

export type TaskStatus = (typeof TASK_STATUSES)[number];
export type TaskPriority = (typeof TASK_PRIORITIES)[number];

export interface User {
    id: string;
    name: string;
    email: string;
    role: string;
    timezone?: string | null;
}

export interface Task {
    id: string;              // assigned by the server, never generated locally
    title: string;
    description: string;
    status: TaskStatus;
    priority: TaskPriority;
    dueDate: string;         // calendar date, YYYY-MM-DD
    createdBy: User;
    assignedTo?: User | null;
    createdAt: string;
    updatedAt: string;
    isOverdue: boolean;      // computed server-side
}

// Interface for data sent when creating a task
export interface CreateTaskPayload {
    title: string;
    description: string;
    dueDate: string;
    priority: TaskPriority;
    assignedTo?: string;     // user id
}

// Partial update: absent fields are left untouched server-side
export interface UpdateTaskPayload {
    title?: string;
    description?: string;
    status?: TaskStatus;
    dueDate?: string;
    priority?: TaskPriority;
    assignedTo?: string;
}

export interface TaskQuery {
    status?: TaskStatus;
    priority?: TaskPriority;
    page?: number;
    pageSize?: number;
}

export interface PageOptions {
    page?: number;
    pageSize?: number;
}

export interface TaskStatistics {
    total: number;
    byStatus: Record<string, number>;
    byPriority: Record<string, number>;
    overdue: number;
}

export interface Session {
    token: string;
    user: User;
}
