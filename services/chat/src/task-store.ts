import { logger } from '@taskchat/shared';

const log = logger.child({ module: 'task-store' });

export interface Task {
  name: string;
  description: string;
  completed: boolean;
}

/**
 * In-memory task store scoped to one chat session.
 *
 * Names are unique keys. Adding an existing name overwrites it (last write
 * wins); the task keeps its place in the listing order.
 */
export class TaskStore {
  private readonly tasks = new Map<string, Task>();

  add(name: string, description: string): Task {
    const replaced = this.tasks.has(name);
    const task: Task = { name, description, completed: false };
    this.tasks.set(name, task);
    log.debug({ name, replaced }, 'task added');
    return { ...task };
  }

  list(): Task[] {
    return Array.from(this.tasks.values(), (t) => ({ ...t }));
  }

  /** Returns false when no task has this name; never creates one */
  markDone(name: string): boolean {
    const task = this.tasks.get(name);
    if (!task) return false;
    task.completed = true;
    log.debug({ name }, 'task marked done');
    return true;
  }

  has(name: string): boolean {
    return this.tasks.has(name);
  }

  get(name: string): Task | undefined {
    const task = this.tasks.get(name);
    return task ? { ...task } : undefined;
  }

  get size(): number {
    return this.tasks.size;
  }
}
