export const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS records (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    source_id TEXT NOT NULL,
    source_type TEXT NOT NULL,
    category TEXT NOT NULL DEFAULT 'unknown',
    companies TEXT NOT NULL DEFAULT '[]',
    title TEXT NOT NULL,
    summary TEXT,
    content_html TEXT,
    url TEXT NOT NULL,
    url_hash TEXT NOT NULL UNIQUE,
    content_hash TEXT NOT NULL,
    publish_date TEXT,
    region TEXT,
    raw_metadata TEXT NOT NULL DEFAULT '{}',
    scraped_at TEXT NOT NULL,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_records_content_hash ON records(content_hash);
  CREATE INDEX IF NOT EXISTS idx_records_source ON records(source_id);
  CREATE INDEX IF NOT EXISTS idx_records_category ON records(category);
  CREATE INDEX IF NOT EXISTS idx_records_publish_date ON records(publish_date DESC);

  CREATE TABLE IF NOT EXISTS ingestion_runs (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    source_id TEXT NOT NULL,
    started_at TEXT NOT NULL,
    completed_at TEXT,
    status TEXT NOT NULL DEFAULT 'running',
    total_processed INTEGER NOT NULL DEFAULT 0,
    new_records INTEGER NOT NULL DEFAULT 0,
    updated_records INTEGER NOT NULL DEFAULT 0,
    duplicate_records INTEGER NOT NULL DEFAULT 0,
    error_metadata TEXT
  );

  CREATE INDEX IF NOT EXISTS idx_runs_started_at ON ingestion_runs(started_at DESC);
  CREATE INDEX IF NOT EXISTS idx_runs_status ON ingestion_runs(status);
`;
