export {
  TaskStore,
  openTaskDB,
  closeTaskDB,
  createTask,
  getTaskDetails,
  updateTask,
  updateTaskStrict,
  deleteTask,
  listActiveTasks,
  completeTask,
  deferTask,
  resumeTask,
  type Logger,
  type OpenTaskDBOptions,
  type TaskConnection,
  type TaskRow,
  type UpdateTaskOptions
} from './utils/db.js';
export { jsonCodec, type StructuredValueCodec } from './utils/codec.js';
export * from './utils/db-errors.js';
export { createRPCHandler, type RpcHandler, type RPCHandlerOptions, type RpcResponse } from './server/rpc-handler.js';
export { createLineProcessor } from './server/stdio.js';
export type { CreateTaskInput, JsonValue, StructuredValue, Task, UpdateTaskPatch, WriteResult } from './types.js';
