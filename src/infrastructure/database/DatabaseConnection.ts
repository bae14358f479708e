import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';

export const IN_MEMORY = ':memory:';

/**
 * Database connection manager
 */
export class DatabaseConnection {
  private db: Database.Database;
  private dbPath: string;

  constructor(dbPath: string = IN_MEMORY) {
    this.dbPath = dbPath === IN_MEMORY ? IN_MEMORY : path.resolve(dbPath);

    // Ensure data directory exists
    if (this.dbPath !== IN_MEMORY) {
      const dataDir = path.dirname(this.dbPath);
      if (!fs.existsSync(dataDir)) {
        fs.mkdirSync(dataDir, { recursive: true });
      }
    }

    this.db = new Database(this.dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('synchronous = NORMAL');
    this.db.pragma('foreign_keys = ON');

    this.initializeTables();
  }

  private initializeTables() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS conversations (
        id TEXT PRIMARY KEY,
        title TEXT,
        description TEXT NOT NULL,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_conversation_created ON conversations(id, created_at);

      CREATE TABLE IF NOT EXISTS messages (
        seq INTEGER PRIMARY KEY AUTOINCREMENT,
        id TEXT NOT NULL UNIQUE,
        conversation_id TEXT NOT NULL,
        role TEXT NOT NULL DEFAULT 'user' CHECK (role IN ('user', 'assistant')),
        text TEXT NOT NULL,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        FOREIGN KEY (conversation_id) REFERENCES conversations(id) ON DELETE CASCADE
      );

      CREATE INDEX IF NOT EXISTS idx_message_conversation_created ON messages(conversation_id, created_at);
    `);
  }

  getDatabase(): Database.Database {
    return this.db;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  getStatistics(): {
    totalConversations: number;
    totalMessages: number;
    databaseSize: number;
  } {
    const count = (table: 'conversations' | 'messages'): number =>
      this.db.prepare<[], { count: number }>(`SELECT COUNT(*) as count FROM ${table}`).get()
        ?.count ?? 0;

    let databaseSize = 0;
    if (this.dbPath !== IN_MEMORY && fs.existsSync(this.dbPath)) {
      databaseSize = fs.statSync(this.dbPath).size;
    }

    return {
      totalConversations: count('conversations'),
      totalMessages: count('messages'),
      databaseSize,
    };
  }
}

// Global instance
let dbInstance: DatabaseConnection | null = null;

export function initializeDatabase(dbPath?: string): DatabaseConnection {
  if (!dbInstance) {
    dbInstance = new DatabaseConnection(dbPath);
  }
  return dbInstance;
}

export function closeDatabase(): void {
  if (dbInstance) {
    dbInstance.close();
    dbInstance = null;
  }
}
