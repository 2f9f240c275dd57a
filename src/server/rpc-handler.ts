/**
 * JSON-RPC method dispatch for the task store
 */

import { z } from 'zod';
import { TaskStore, type Logger } from '../utils/db.js';
import { DatabaseError } from '../utils/db-errors.js';
import { validateInput } from '../utils/db-validators.js';
import { CreateTaskInputSchema, TaskIdSchema, UpdateTaskPatchSchema } from '../types.js';

export type RpcId = number | string | null;

export type RpcResponse =
  | { jsonrpc: '2.0'; id: RpcId; result: unknown }
  | { jsonrpc: '2.0'; id: RpcId; error: { code: number; message: string } };

export type RpcHandler = (method: string, params: unknown, id: RpcId) => RpcResponse;

export function ok(result: unknown, id: RpcId): RpcResponse {
  return { jsonrpc: '2.0', id, result };
}

export function err(code: number, message: string, id: RpcId): RpcResponse {
  return { jsonrpc: '2.0', id, error: { code, message } };
}

const TaskIdParamsSchema = z.object({ task_id: TaskIdSchema });

const UpdateParamsSchema = UpdateTaskPatchSchema.extend({
  task_id: TaskIdSchema,
  strict: z.boolean().optional(),
});

export type RPCHandlerOptions = {
  // strict used by task.update when the request does not set one
  strictUpdate?: boolean;
};

/**
 * Create RPC handler bound to one explicitly opened store
 */
export function createRPCHandler(
  store: TaskStore,
  logger: Logger = console,
  options: RPCHandlerOptions = {}
): RpcHandler {
  const strictUpdate = options.strictUpdate ?? false;

  return function handleRPC(method, params, id) {
    try {
      switch (method) {
        case 'task.create': {
          const input = validateInput(CreateTaskInputSchema, params);
          return ok(store.create(input), id);
        }

        case 'task.get': {
          const { task_id } = validateInput(TaskIdParamsSchema, params);
          const task = store.get(task_id);
          return ok({ found: task !== null, task }, id);
        }

        case 'task.update': {
          const { task_id, strict, ...patch } = validateInput(UpdateParamsSchema, params);
          return ok(store.update(task_id, patch, { strict: strict ?? strictUpdate }), id);
        }

        case 'task.delete': {
          const { task_id } = validateInput(TaskIdParamsSchema, params);
          return ok(store.delete(task_id), id);
        }

        case 'task.list_active':
          return ok({ tasks: store.listActive() }, id);

        case 'task.complete': {
          const { task_id } = validateInput(TaskIdParamsSchema, params);
          return ok(store.complete(task_id), id);
        }

        case 'task.defer': {
          const { task_id } = validateInput(TaskIdParamsSchema, params);
          return ok(store.defer(task_id), id);
        }

        case 'task.resume': {
          const { task_id } = validateInput(TaskIdParamsSchema, params);
          return ok(store.resume(task_id), id);
        }

        default:
          return err(-32601, 'method_not_found', id);
      }
    } catch (e) {
      if (e instanceof DatabaseError) {
        if (e.statusCode >= 500) {
          logger.error(`[tasks-rpc] ${method} failed: ${e.message}`);
        }
        return err(e.statusCode, e.message, id);
      }
      const message = e instanceof Error ? e.message : String(e);
      logger.error(`[tasks-rpc] ${method} failed: ${message}`);
      return err(500, message || 'error', id);
    }
  };
}
