import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { CONFIG } from '../config.js';
import { jsonCodec, type StructuredValueCodec } from './codec.js';
import { DatabaseHelpers } from './db-helpers.js';
import {
  DuplicateTaskIdError,
  StorageUnavailableError,
  TaskNotFoundError,
  handleDatabaseError,
  isUniqueViolation
} from './db-errors.js';
import { validateInput } from './db-validators.js';
import {
  CreateTaskInputSchema,
  UpdateTaskPatchSchema,
  type CreateTaskInput,
  type Task,
  type UpdateTaskPatch,
  type WriteResult
} from '../types.js';

export type Logger = Pick<Console, 'log' | 'warn' | 'error'>;

export type TaskRow = {
  id: number;
  task_id: string;
  summary: string;
  conversation: string | null;
  details: string | null;
  steps: string | null;
  current_step_num: number | null;
  is_active: number;
  is_waiting: number;
};

export type OpenTaskDBOptions = {
  codec?: StructuredValueCodec;
  logger?: Logger;
  busyTimeoutMs?: number;
  fileMustExist?: boolean;
};

export type UpdateTaskOptions = {
  strict?: boolean;
};

/**
 * An open store: the SQLite handle plus the codec and logger every operation uses.
 */
export type TaskConnection = {
  file: string;
  db: Database.Database;
  codec: StructuredValueCodec;
  logger: Logger;
  helpers: DatabaseHelpers;
};

const TASK_COLUMNS = 'id, task_id, summary, conversation, details, steps, current_step_num, is_active, is_waiting';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS tasks (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    task_id TEXT NOT NULL UNIQUE,
    summary TEXT NOT NULL,
    conversation TEXT,
    details TEXT,
    steps TEXT,
    current_step_num INTEGER NOT NULL DEFAULT 0,
    is_active INTEGER NOT NULL DEFAULT 1,
    is_waiting INTEGER NOT NULL DEFAULT 0
  );
`;

function isMemoryPath(file: string): boolean {
  return file === ':memory:' || file === '';
}

function pragma(db: Database.Database, file: string) {
  if (!isMemoryPath(file)) {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('synchronous = NORMAL');
}

function initSchema(db: Database.Database, logger: Logger) {
  const existed = db.prepare(`SELECT name FROM sqlite_master WHERE type='table' AND name='tasks'`).get() !== undefined;
  db.exec(SCHEMA);
  if (!existed) {
    logger.log('[tasks-db] created tasks table');
    return;
  }

  // Tables written before task_id existed are keyed by id only
  const columns = db.prepare<[], { name: string }>(`PRAGMA table_info(tasks)`).all().map(c => c.name);
  if (!columns.includes('task_id')) {
    const adopt = db.transaction(() => {
      db.exec(`ALTER TABLE tasks ADD COLUMN task_id TEXT`);
      db.exec(`UPDATE tasks SET task_id = CAST(id AS TEXT) WHERE task_id IS NULL`);
      db.exec(`CREATE UNIQUE INDEX IF NOT EXISTS idx_tasks_task_id ON tasks(task_id)`);
    });
    adopt();
    logger.warn('[tasks-db] added task_id to legacy tasks table (backfilled from id)');
  }
}

/**
 * Opens (or creates) the task database at `file` and ensures the schema exists.
 * Any failure to reach the location surfaces as StorageUnavailableError.
 */
export function openTaskDB(file: string, options: OpenTaskDBOptions = {}): TaskConnection {
  const logger = options.logger ?? console;
  const fileMustExist = options.fileMustExist ?? false;
  let db: Database.Database | undefined;
  try {
    if (!isMemoryPath(file) && !fileMustExist) {
      fs.mkdirSync(path.dirname(file), { recursive: true });
    }
    db = new Database(file, {
      fileMustExist,
      timeout: options.busyTimeoutMs ?? CONFIG.busyTimeoutMs,
    });
    pragma(db, file);
    initSchema(db, logger);
    return {
      file,
      db,
      codec: options.codec ?? jsonCodec,
      logger,
      helpers: new DatabaseHelpers(db),
    };
  } catch (error) {
    if (db?.open) {
      db.close();
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new StorageUnavailableError(`cannot open ${file}: ${message}`);
  }
}

export function closeTaskDB(conn: TaskConnection): void {
  conn.helpers.ensureOpen('close');
  conn.db.close();
  conn.logger.log(`[tasks-db] closed ${conn.file}`);
}

function toTask(row: TaskRow, codec: StructuredValueCodec): Task {
  return {
    internal_id: row.id,
    task_id: row.task_id,
    summary: row.summary,
    conversation: row.conversation === null ? [] : codec.decode(row.conversation),
    details: row.details ?? '',
    steps: row.steps === null ? [] : codec.decode(row.steps),
    current_step_num: row.current_step_num ?? 0,
    is_active: row.is_active !== 0,
    is_waiting: row.is_waiting !== 0,
  };
}

/**
 * Inserts a new active, non-waiting task. The returned internal id is diagnostic only;
 * every other operation addresses the task by `task_id`.
 */
export function createTask(conn: TaskConnection, input: CreateTaskInput): { internal_id: number } {
  const data = validateInput(CreateTaskInputSchema, input);
  const conversation = conn.codec.encode(data.conversation);
  const steps = conn.codec.encode(data.steps);

  conn.helpers.ensureOpen('create task');
  try {
    const result = conn.db
      .prepare(`INSERT INTO tasks (task_id, summary, conversation, details, steps, current_step_num, is_active, is_waiting) VALUES (?,?,?,?,?,0,1,0)`)
      .run(data.task_id, data.summary, conversation, data.details, steps);
    return { internal_id: Number(result.lastInsertRowid) };
  } catch (error) {
    if (isUniqueViolation(error)) {
      throw new DuplicateTaskIdError(data.task_id);
    }
    handleDatabaseError(error, 'create task');
  }
}

/**
 * Returns the decoded task, or null when no row has this task_id.
 */
export function getTaskDetails(conn: TaskConnection, taskId: string): Task | null {
  const row = conn.helpers.safeGet<TaskRow>(
    `SELECT ${TASK_COLUMNS} FROM tasks WHERE task_id = ?`,
    [taskId],
    'get task'
  );
  return row ? toTask(row, conn.codec) : null;
}

/**
 * Partial merge: fields left undefined keep their stored value (the stored text is written
 * back as-is, never re-encoded). A missing task_id is a no-op unless `strict` is set.
 */
export function updateTask(
  conn: TaskConnection,
  taskId: string,
  patch: UpdateTaskPatch = {},
  options: UpdateTaskOptions = {}
): WriteResult {
  const data = validateInput(UpdateTaskPatchSchema, patch);
  const strict = options.strict ?? false;

  return conn.helpers.executeTransaction(() => {
    const row = conn.helpers.safeGet<TaskRow>(
      `SELECT ${TASK_COLUMNS} FROM tasks WHERE task_id = ?`,
      [taskId],
      'update task'
    );
    if (!row) {
      if (strict) {
        throw new TaskNotFoundError(taskId);
      }
      return { changes: 0 };
    }

    const summary = data.summary !== undefined ? data.summary : row.summary;
    const conversation = data.conversation !== undefined ? conn.codec.encode(data.conversation) : row.conversation;
    const details = data.details !== undefined ? data.details : row.details;
    const steps = data.steps !== undefined ? conn.codec.encode(data.steps) : row.steps;

    const result = conn.helpers.safeRun(
      `UPDATE tasks SET summary=?, conversation=?, details=?, steps=? WHERE id=?`,
      [summary, conversation, details, steps, row.id],
      'update task'
    );
    return { changes: result.changes };
  }, 'update task');
}

export function updateTaskStrict(conn: TaskConnection, taskId: string, patch: UpdateTaskPatch = {}): WriteResult {
  return updateTask(conn, taskId, patch, { strict: true });
}

export function deleteTask(conn: TaskConnection, taskId: string): WriteResult {
  const result = conn.helpers.safeRun(`DELETE FROM tasks WHERE task_id = ?`, [taskId], 'delete task');
  return { changes: result.changes };
}

/**
 * Active tasks in insertion order
 */
export function listActiveTasks(conn: TaskConnection): Task[] {
  const rows = conn.helpers.safeQuery<TaskRow>(
    `SELECT ${TASK_COLUMNS} FROM tasks WHERE is_active = 1 ORDER BY id`,
    [],
    'list active tasks'
  );
  return rows.map(row => toTask(row, conn.codec));
}

function setFlag(conn: TaskConnection, taskId: string, column: 'is_active' | 'is_waiting', value: boolean, context: string): WriteResult {
  const result = conn.helpers.safeRun(
    `UPDATE tasks SET ${column} = ? WHERE task_id = ?`,
    [value ? 1 : 0, taskId],
    context
  );
  return { changes: result.changes };
}

export function completeTask(conn: TaskConnection, taskId: string): WriteResult {
  return setFlag(conn, taskId, 'is_active', false, 'complete task');
}

export function deferTask(conn: TaskConnection, taskId: string): WriteResult {
  return setFlag(conn, taskId, 'is_waiting', true, 'defer task');
}

export function resumeTask(conn: TaskConnection, taskId: string): WriteResult {
  return setFlag(conn, taskId, 'is_waiting', false, 'resume task');
}

/**
 * Holds one explicitly opened connection and forwards to the operations above.
 */
export class TaskStore {
  constructor(readonly conn: TaskConnection) {}

  static open(file: string, options: OpenTaskDBOptions = {}): TaskStore {
    return new TaskStore(openTaskDB(file, options));
  }

  create(input: CreateTaskInput) {
    return createTask(this.conn, input);
  }

  get(taskId: string) {
    return getTaskDetails(this.conn, taskId);
  }

  update(taskId: string, patch: UpdateTaskPatch = {}, options: UpdateTaskOptions = {}) {
    return updateTask(this.conn, taskId, patch, options);
  }

  updateStrict(taskId: string, patch: UpdateTaskPatch = {}) {
    return updateTaskStrict(this.conn, taskId, patch);
  }

  delete(taskId: string) {
    return deleteTask(this.conn, taskId);
  }

  listActive() {
    return listActiveTasks(this.conn);
  }

  complete(taskId: string) {
    return completeTask(this.conn, taskId);
  }

  defer(taskId: string) {
    return deferTask(this.conn, taskId);
  }

  resume(taskId: string) {
    return resumeTask(this.conn, taskId);
  }

  close() {
    closeTaskDB(this.conn);
  }
}
