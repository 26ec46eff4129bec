import { mkdirSync } from "fs";
import { dirname } from "path";
import Database from "better-sqlite3";
import { SCHEMA_SQL } from "./schema";

export type SqliteDatabase = Database.Database;

export type RecordRow = {
  id: number;
  source_id: string;
  source_type: string;
  category: string;
  companies: string;
  title: string;
  summary: string | null;
  content_html: string | null;
  url: string;
  url_hash: string;
  content_hash: string;
  publish_date: string | null;
  region: string | null;
  raw_metadata: string;
  scraped_at: string;
  created_at: string;
  updated_at: string;
};

export type IngestionRunRow = {
  id: number;
  source_id: string;
  started_at: string;
  completed_at: string | null;
  status: string;
  total_processed: number;
  new_records: number;
  updated_records: number;
  duplicate_records: number;
  error_metadata: string | null;
};

export const openDatabase = (filePath: string): SqliteDatabase => {
  if (filePath !== ":memory:") {
    mkdirSync(dirname(filePath), { recursive: true });
  }
  const db = new Database(filePath);
  if (filePath !== ":memory:") {
    db.pragma("journal_mode = WAL");
  }
  db.pragma("foreign_keys = ON");
  db.exec(SCHEMA_SQL);
  return db;
};

export { SCHEMA_SQL };
