// /src/lib/schemas.ts
// Shapes of the API payloads. Anything that fails these is a malformed response.

import { z } from 'zod';
import {
  TASK_PRIORITIES,
  TASK_STATUSES,
  type Session,
  type Task,
  type TaskStatistics,
  type User,
} from '@/types/tasks';

export const userSchema: z.ZodType<User> = z.object({
  id: z.string(),
  name: z.string(),
  email: z.string(),
  role: z.string(),
  timezone: z.string().nullish(),
});

export const taskSchema: z.ZodType<Task> = z.object({
  id: z.string().min(1),
  title: z.string().min(1),
  description: z.string(),
  status: z.enum(TASK_STATUSES),
  priority: z.enum(TASK_PRIORITIES),
  dueDate: z.string(),
  createdBy: userSchema,
  assignedTo: userSchema.nullish(),
  createdAt: z.string(),
  updatedAt: z.string(),
  isOverdue: z.boolean(),
});

export const taskListSchema = z.object({
  tasks: z.array(taskSchema),
});

export const statisticsSchema: z.ZodType<TaskStatistics, z.ZodTypeDef, unknown> = z.object({
  total: z.number().int().default(0),
  byStatus: z.record(z.number()).default({}),
  byPriority: z.record(z.number()).default({}),
  overdue: z.number().int().default(0),
});

export const sessionSchema: z.ZodType<Session> = z.object({
  token: z.string().min(1),
  user: userSchema,
});

// { success: true, data } on success, { error: true, message } otherwise
export const envelopeSchema = z.object({
  success: z.boolean().optional(),
  error: z.boolean().optional(),
  message: z.string().optional(),
  data: z.unknown().optional(),
});

export type Envelope = z.infer<typeof envelopeSchema>;
