export const CONFIG = {
  dataDir: process.env.DATA_DIR || "./data",
  dbFile: process.env.DB_FILE || "tasks.db",
  busyTimeoutMs: parseInt(process.env.TASKS_BUSY_TIMEOUT_MS || "5000", 10),
  // Default for task.update over stdio: throw on a missing task_id instead of a no-op
  strictUpdate: (process.env.TASKS_STRICT_UPDATE || "false") === "true",
};
