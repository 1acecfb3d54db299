import type { Task, User } from '@/types/tasks';

export const alice: User = {
  id: 'u1',
  name: 'Alice Example',
  email: 'alice@example.com',
  role: 'USER',
  timezone: null,
};

export const makeTask = (id: string, overrides: Partial<Task> = {}): Task => ({
  id,
  title: `Task ${id}`,
  description: '',
  status: 'TODO',
  priority: 'MEDIUM',
  dueDate: '2024-06-01',
  createdBy: alice,
  assignedTo: null,
  createdAt: '2024-05-01T09:00:00.000Z',
  updatedAt: '2024-05-01T09:00:00.000Z',
  isOverdue: false,
  ...overrides,
});
