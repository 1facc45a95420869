/**
 * Journal tables. The two dialects differ only in how the event sequence
 * column is generated.
 */

const CHANGE_TASKS = `
CREATE TABLE IF NOT EXISTS change_tasks (
  id TEXT PRIMARY KEY,
  kind TEXT NOT NULL,
  summary TEXT NOT NULL,
  status TEXT NOT NULL,
  status_location TEXT,
  error TEXT,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
);
`;

export const SQLITE_SCHEMA_SQL = `${CHANGE_TASKS}
CREATE TABLE IF NOT EXISTS task_events (
  seq INTEGER PRIMARY KEY AUTOINCREMENT,
  task_id TEXT NOT NULL REFERENCES change_tasks(id) ON DELETE CASCADE,
  status TEXT NOT NULL,
  created_at TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS task_events_task_id ON task_events (task_id);
`;

export const POSTGRES_SCHEMA_SQL = `${CHANGE_TASKS}
CREATE TABLE IF NOT EXISTS task_events (
  seq BIGSERIAL PRIMARY KEY,
  task_id TEXT NOT NULL REFERENCES change_tasks(id) ON DELETE CASCADE,
  status TEXT NOT NULL,
  created_at TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS task_events_task_id ON task_events (task_id);
`;
