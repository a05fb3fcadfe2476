import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import { fileURLToPath } from 'url';
import { dirname } from 'path';
import { createLogger, NAMESPACES } from './logging.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const log = createLogger(NAMESPACES.services.project);

export const DEFAULT_DB_PATH = path.join(__dirname, '..', 'data', 'chapterwise.db');

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS Projects (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    title TEXT NOT NULL UNIQUE,
    data TEXT NOT NULL,
    characterState TEXT NOT NULL DEFAULT '{}',
    createdAt TEXT NOT NULL,
    updatedAt TEXT NOT NULL
  );
`;

/**
 * Opens (or creates) the project database and makes sure the schema exists.
 * Pass ':memory:' for a throwaway database.
 */
export function createDatabase(dbPath: string = DEFAULT_DB_PATH): Database.Database {
  if (dbPath !== ':memory:') {
    // Ensure parent directories exist to avoid disk I/O errors
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  const db = new Database(dbPath);
  try {
    db.pragma('journal_mode = WAL');
  } catch (e) {
    log('failed to enable WAL, continuing with default mode: %s', e instanceof Error ? e.message : String(e));
  }
  db.exec(SCHEMA);
  return db;
}

export default createDatabase;
