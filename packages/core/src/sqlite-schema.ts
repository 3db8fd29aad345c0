export const SQLITE_SCHEMA = `
PRAGMA foreign_keys = ON;

CREATE TABLE IF NOT EXISTS schema_migrations (
  version INTEGER PRIMARY KEY
);

CREATE TABLE IF NOT EXISTS records (
  id TEXT PRIMARY KEY,
  kind TEXT NOT NULL,
  seriesId TEXT,
  origin TEXT NOT NULL,
  version INTEGER NOT NULL,
  updatedAt TEXT NOT NULL,
  deletedAt TEXT,
  payload TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_records_kind ON records(kind);
CREATE INDEX IF NOT EXISTS idx_records_series ON records(seriesId);
CREATE INDEX IF NOT EXISTS idx_records_deleted ON records(deletedAt);

CREATE TABLE IF NOT EXISTS pending_changes (
  seq INTEGER PRIMARY KEY AUTOINCREMENT,
  id TEXT NOT NULL UNIQUE,
  target TEXT NOT NULL,
  op TEXT NOT NULL,
  recordId TEXT NOT NULL,
  record TEXT NOT NULL,
  createdAt TEXT NOT NULL,
  retryCount INTEGER NOT NULL DEFAULT 0,
  nextAttemptAt TEXT,
  lastError TEXT,
  failedAt TEXT
);

CREATE INDEX IF NOT EXISTS idx_pending_target ON pending_changes(target, seq);
CREATE INDEX IF NOT EXISTS idx_pending_record ON pending_changes(recordId);

CREATE TABLE IF NOT EXISTS sync_cursors (
  target TEXT PRIMARY KEY,
  cursor TEXT NOT NULL,
  updatedAt TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS scheduled_notifications (
  id TEXT PRIMARY KEY,
  occurrenceId TEXT NOT NULL,
  offsetMinutes INTEGER NOT NULL,
  triggerAt TEXT NOT NULL,
  channel TEXT NOT NULL,
  kind TEXT NOT NULL,
  UNIQUE (occurrenceId, offsetMinutes)
);

CREATE TABLE IF NOT EXISTS settings (
  id INTEGER PRIMARY KEY CHECK (id = 1),
  data TEXT NOT NULL
);

INSERT OR IGNORE INTO schema_migrations (version) VALUES (1);
`;
