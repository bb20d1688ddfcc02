import { ToolRegistry } from '../tool-registry.js';
import type { TaskStore } from '../task-store.js';
import { createTaskTools, type TaskToolName } from './task-tools.js';

export { TASK_TOOL_NAMES, createTaskTools, type TaskToolName } from './task-tools.js';

/**
 * Build the registry a chat session advertises to the model.
 */
export function createTaskRegistry(store: TaskStore): ToolRegistry<TaskToolName> {
  return new ToolRegistry<TaskToolName>(createTaskTools(store));
}
