import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { TaskStore } from '../../src/utils/db.js';
import { createRPCHandler, type RpcHandler } from '../../src/server/rpc-handler.js';

describe('RPC handler', () => {
  let store: TaskStore;
  let handleRPC: RpcHandler;
  const logger = { log: vi.fn(), warn: vi.fn(), error: vi.fn() };

  beforeEach(() => {
    logger.error.mockClear();
    store = TaskStore.open(':memory:', { logger });
    handleRPC = createRPCHandler(store, logger);
  });

  afterEach(() => {
    if (store.conn.db.open) {
      store.close();
    }
  });

  it('creates and fetches a task', () => {
    expect(handleRPC('task.create', { task_id: 'r1', summary: 'Ship it', steps: ['build', 'deploy'] }, 1))
      .toEqual({ jsonrpc: '2.0', id: 1, result: { internal_id: 1 } });

    expect(handleRPC('task.get', { task_id: 'r1' }, 2)).toEqual({
      jsonrpc: '2.0',
      id: 2,
      result: {
        found: true,
        task: {
          internal_id: 1,
          task_id: 'r1',
          summary: 'Ship it',
          conversation: [],
          details: '',
          steps: ['build', 'deploy'],
          current_step_num: 0,
          is_active: true,
          is_waiting: false,
        },
      },
    });
  });

  it('reports an absent task as not found rather than an error', () => {
    expect(handleRPC('task.get', { task_id: 'nope' }, 'a')).toEqual({
      jsonrpc: '2.0',
      id: 'a',
      result: { found: false, task: null },
    });
  });

  it('returns validation failures as 400', () => {
    expect(handleRPC('task.create', { task_id: 'r2' }, 3)).toEqual({
      jsonrpc: '2.0',
      id: 3,
      error: { code: 400, message: 'summary: summary is required' },
    });
    expect(handleRPC('task.create', { task_id: 'r2', summary: '  ' }, 4)).toEqual({
      jsonrpc: '2.0',
      id: 4,
      error: { code: 400, message: 'summary: summary must be a non-empty string' },
    });
    expect(handleRPC('task.update', { task_id: 'r2', details: 7 }, 5)).toMatchObject({
      error: { code: 400 },
    });
  });

  it('returns duplicates as 409', () => {
    handleRPC('task.create', { task_id: 'dup', summary: 'one' }, 1);
    expect(handleRPC('task.create', { task_id: 'dup', summary: 'two' }, 2)).toEqual({
      jsonrpc: '2.0',
      id: 2,
      error: { code: 409, message: 'Task dup already exists' },
    });
  });

  it('merges partial updates and honours strict mode', () => {
    handleRPC('task.create', { task_id: 'm', summary: 'before', details: 'keep me' }, 1);

    expect(handleRPC('task.update', { task_id: 'm', summary: 'after' }, 2))
      .toEqual({ jsonrpc: '2.0', id: 2, result: { changes: 1 } });
    expect(store.get('m')).toMatchObject({ summary: 'after', details: 'keep me' });

    expect(handleRPC('task.update', { task_id: 'ghost', summary: 'x' }, 3))
      .toEqual({ jsonrpc: '2.0', id: 3, result: { changes: 0 } });
    expect(handleRPC('task.update', { task_id: 'ghost', summary: 'x', strict: true }, 4))
      .toEqual({ jsonrpc: '2.0', id: 4, error: { code: 404, message: 'Task ghost not found' } });
  });

  it('applies the configured strict default unless the request overrides it', () => {
    const strictRPC = createRPCHandler(store, logger, { strictUpdate: true });

    expect(strictRPC('task.update', { task_id: 'ghost', summary: 'x' }, 1))
      .toEqual({ jsonrpc: '2.0', id: 1, error: { code: 404, message: 'Task ghost not found' } });
    expect(strictRPC('task.update', { task_id: 'ghost', summary: 'x', strict: false }, 2))
      .toEqual({ jsonrpc: '2.0', id: 2, result: { changes: 0 } });
  });

  it('passes mappings through create and update', () => {
    handleRPC('task.create', { task_id: 'map', summary: 'M', steps: { next: 'call' } }, 1);
    handleRPC('task.update', { task_id: 'map', conversation: { role: 'user' } }, 2);

    expect(store.get('map')).toMatchObject({ steps: { next: 'call' }, conversation: { role: 'user' } });
  });

  it('runs lifecycle transitions and lists active tasks', () => {
    handleRPC('task.create', { task_id: 'a', summary: 'A' }, 1);
    handleRPC('task.create', { task_id: 'b', summary: 'B' }, 2);

    expect(handleRPC('task.defer', { task_id: 'a' }, 3)).toMatchObject({ result: { changes: 1 } });
    expect(handleRPC('task.complete', { task_id: 'b' }, 4)).toMatchObject({ result: { changes: 1 } });
    expect(handleRPC('task.resume', { task_id: 'missing' }, 5)).toMatchObject({ result: { changes: 0 } });

    const listed = handleRPC('task.list_active', undefined, 6);
    expect(listed).toMatchObject({
      result: { tasks: [{ task_id: 'a', is_waiting: true, is_active: true }] },
    });

    expect(handleRPC('task.delete', { task_id: 'a' }, 7)).toMatchObject({ result: { changes: 1 } });
    expect(store.listActive()).toEqual([]);
  });

  it('rejects unknown methods', () => {
    expect(handleRPC('task.explode', {}, 9)).toEqual({
      jsonrpc: '2.0',
      id: 9,
      error: { code: -32601, message: 'method_not_found' },
    });
  });

  it('returns 503 and logs once the store is closed', () => {
    store.close();
    expect(handleRPC('task.get', { task_id: 'x' }, 1)).toEqual({
      jsonrpc: '2.0',
      id: 1,
      error: { code: 503, message: 'Storage unavailable: get task: connection is closed' },
    });
    expect(logger.error).toHaveBeenCalledWith('[tasks-rpc] task.get failed: Storage unavailable: get task: connection is closed');
  });
});
