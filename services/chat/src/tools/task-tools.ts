import { z } from 'zod';
import { logger } from '@taskchat/shared';
import { defineTool } from '../tool-registry.js';
import type { TaskStore } from '../task-store.js';
import type { RegisteredTool } from '../types.js';

const log = logger.child({ module: 'task-tools' });

export const TASK_TOOL_NAMES = ['add_task', 'list_tasks', 'mark_task_done', 'has_task'] as const;

export type TaskToolName = (typeof TASK_TOOL_NAMES)[number];

export function createTaskTools(store: TaskStore): Record<TaskToolName, RegisteredTool> {
  return {
    add_task: defineTool({
      definition: {
        name: 'add_task',
        description: 'Add a new task with a name and description',
        input_schema: {
          type: 'object',
          properties: {
            name: { type: 'string', description: 'The name/identifier of the task' },
            description: { type: 'string', description: 'A description of what the task involves' },
          },
          required: ['name', 'description'],
        },
      },
      parameters: { name: z.string(), description: z.string() },
      handler: ({ name, description }) => {
        log.debug({ name }, 'add task');
        store.add(name, description);
        return `Task '${name}' added successfully. Task description is: ${description}`;
      },
    }),

    list_tasks: defineTool({
      definition: {
        name: 'list_tasks',
        description: 'List all current tasks',
        input_schema: {
          type: 'object',
          properties: {},
          required: [],
        },
      },
      parameters: {},
      handler: () => {
        const tasks = store.list();
        if (tasks.length === 0) return 'No tasks found.';

        const lines = tasks.map(
          (t) => `- ${t.name}: ${t.description} (${t.completed ? '✅ Done' : '⏳ Pending'})`,
        );
        return `Current tasks:\n${lines.join('\n')}`;
      },
    }),

    mark_task_done: defineTool({
      definition: {
        name: 'mark_task_done',
        description: 'Mark a task as completed',
        input_schema: {
          type: 'object',
          properties: {
            name: { type: 'string', description: 'The name of the task to mark as done' },
          },
          required: ['name'],
        },
      },
      parameters: { name: z.string() },
      handler: ({ name }) => {
        if (!store.markDone(name)) return `Task '${name}' not found.`;
        return `Task '${name}' marked as completed.`;
      },
    }),

    has_task: defineTool({
      definition: {
        name: 'has_task',
        description: 'Check if a task exists',
        input_schema: {
          type: 'object',
          properties: {
            name: { type: 'string', description: 'The name of the task to check' },
          },
          required: ['name'],
        },
      },
      parameters: { name: z.string() },
      handler: ({ name }) => {
        const exists = store.has(name);
        log.debug({ name, exists }, 'has task');
        return exists;
      },
    }),
  };
}
