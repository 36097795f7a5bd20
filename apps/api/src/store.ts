import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import type { AnalysisBundle } from './types/schema';
import { logger } from './utils/logger';

const IN_MEMORY = ':memory:';

let db: Database.Database | null = null;

const dbLocation = () => {
  const dataDir = process.env.DATA_DIR || path.join(process.cwd(), 'data');
  return dataDir === IN_MEMORY ? IN_MEMORY : path.join(dataDir, 'state.db');
};

const getDb = () => {
  if (!db) {
    const location = dbLocation();
    if (location !== IN_MEMORY) {
      fs.mkdirSync(path.dirname(location), { recursive: true });
    }
    db = new Database(location);
    if (location !== IN_MEMORY) db.pragma('journal_mode = WAL');
    db.exec(`
      CREATE TABLE IF NOT EXISTS analysis_state (
        id TEXT PRIMARY KEY,
        bundle TEXT NOT NULL,
        updated_at TEXT NOT NULL
      )
    `);
  }
  return db;
};

const isAnalysisBundle = (value: unknown): value is AnalysisBundle => {
  if (typeof value !== 'object' || value === null) return false;
  const keys = ['generatedAt', 'datasets', 'profiles', 'keyCandidates', 'roles', 'graph', 'dictionary', 'status'];
  return keys.every(k => k in value);
};

export const readAnalysis = async (): Promise<AnalysisBundle | null> => {
  const database = getDb();
  const row = database.prepare('SELECT bundle FROM analysis_state WHERE id = ?').get('default') as
    | { bundle: string }
    | undefined;
  if (!row) return null;
  try {
    const parsed: unknown = JSON.parse(row.bundle);
    return isAnalysisBundle(parsed) ? parsed : null;
  } catch (err) {
    logger.warn('Stored analysis is not valid JSON', { error: String(err) });
    return null;
  }
};

export const writeAnalysis = async (bundle: AnalysisBundle) => {
  const database = getDb();
  const payload = JSON.stringify(bundle);
  const now = new Date().toISOString();
  database
    .prepare(
      `
      INSERT INTO analysis_state (id, bundle, updated_at)
      VALUES (?, ?, ?)
      ON CONFLICT(id) DO UPDATE SET
        bundle = excluded.bundle,
        updated_at = excluded.updated_at
      `
    )
    .run('default', payload, now);
};

export const clearAnalysis = async () => {
  const database = getDb();
  database.prepare('DELETE FROM analysis_state WHERE id = ?').run('default');
};
