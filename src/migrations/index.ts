export type Migration = {
  version: number;
  name: string;
  up: string;
};

/** Applied in order; `version` is what `PRAGMA user_version` ends up at. */
export const migrations: readonly Migration[] = [
  {
    version: 1,
    name: 'create-errors',
    up: `
      CREATE TABLE IF NOT EXISTS errors (
        id              INTEGER PRIMARY KEY AUTOINCREMENT,
        event_id        TEXT,
        project         TEXT,
        message         TEXT NOT NULL DEFAULT '',
        exception_type  TEXT,
        exception_value TEXT,
        stacktrace      TEXT,
        level           TEXT,
        occurred_at     TEXT,
        shape           TEXT NOT NULL,
        raw_payload     TEXT NOT NULL,
        received_at     TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_errors_event_id ON errors (event_id);
      CREATE INDEX IF NOT EXISTS idx_errors_project ON errors (project);
    `,
  },
];
