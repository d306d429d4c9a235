import Database from 'better-sqlite3';
import runMigrations from '../runMigrations';

export function setupTestDb() {
  const db = new Database(':memory:');
  runMigrations(db);
  return db;
}

export function cleanTestDb(db: Database.Database) {
  // Reminders go with their notes (ON DELETE CASCADE)
  db.exec(`
    DELETE FROM sync_conflicts;
    DELETE FROM sync_state;
    DELETE FROM notes;
  `);
}
