import { describe, it, expect, vi } from 'vitest';

vi.mock('@taskchat/shared', async (importOriginal) => ({
  ...(await importOriginal<typeof import('@taskchat/shared')>()),
  logger: {
    child: vi.fn().mockReturnValue({ info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() }),
  },
}));

import { TaskStore } from '../task-store.js';

describe('TaskStore', () => {
  it('starts empty', () => {
    const store = new TaskStore();
    expect(store.size).toBe(0);
    expect(store.list()).toEqual([]);
    expect(store.has('anything')).toBe(false);
  });

  it('adds a pending task', () => {
    const store = new TaskStore();
    const task = store.add('shopping', 'buy groceries');

    expect(task).toEqual({ name: 'shopping', description: 'buy groceries', completed: false });
    expect(store.has('shopping')).toBe(true);
    expect(store.get('shopping')).toEqual(task);
  });

  it('lists tasks in insertion order', () => {
    const store = new TaskStore();
    store.add('a', 'first');
    store.add('b', 'second');
    store.add('c', 'third');

    expect(store.list().map((t) => t.name)).toEqual(['a', 'b', 'c']);
  });

  it('overwrites an existing name, keeping its position', () => {
    const store = new TaskStore();
    store.add('a', 'first');
    store.add('b', 'second');
    store.markDone('a');
    store.add('a', 'rewritten');

    expect(store.size).toBe(2);
    expect(store.list()).toEqual([
      { name: 'a', description: 'rewritten', completed: false },
      { name: 'b', description: 'second', completed: false },
    ]);
  });

  it('marks an existing task done', () => {
    const store = new TaskStore();
    store.add('laundry', 'wash and fold');

    expect(store.markDone('laundry')).toBe(true);
    expect(store.get('laundry')?.completed).toBe(true);
  });

  it('marking twice is harmless', () => {
    const store = new TaskStore();
    store.add('laundry', 'wash and fold');
    store.markDone('laundry');

    expect(store.markDone('laundry')).toBe(true);
    expect(store.get('laundry')?.completed).toBe(true);
  });

  it('does not create a task when marking an unknown name', () => {
    const store = new TaskStore();

    expect(store.markDone('ghost')).toBe(false);
    expect(store.has('ghost')).toBe(false);
    expect(store.size).toBe(0);
  });

  it('hands out copies', () => {
    const store = new TaskStore();
    store.add('a', 'first');

    const [listed] = store.list();
    listed.completed = true;
    const fetched = store.get('a');
    if (fetched) fetched.description = 'changed';

    expect(store.get('a')).toEqual({ name: 'a', description: 'first', completed: false });
  });

  it('treats names as exact keys', () => {
    const store = new TaskStore();
    store.add('Shopping', 'buy groceries');

    expect(store.has('shopping')).toBe(false);
    expect(store.has('Shopping ')).toBe(false);
  });
});
