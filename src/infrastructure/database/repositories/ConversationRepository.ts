import Database from 'better-sqlite3';
import { randomUUID } from 'crypto';
import { IConversationRepository } from '../../../core/interfaces/IConversationRepository.js';
import {
  Conversation,
  ConversationChanges,
  ConversationRecord,
  NewConversation,
} from '../../../core/entities/Conversation.js';

function toConversation(row: ConversationRecord): Conversation {
  return {
    id: row.id,
    title: row.title,
    description: row.description,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

/**
 * SQLite implementation of conversation repository
 */
export class ConversationRepository implements IConversationRepository {
  private readonly cascadeDelete: (id: string) => number;

  constructor(private db: Database.Database) {
    this.cascadeDelete = this.db.transaction((id: string): number => {
      const removed = this.db.prepare('DELETE FROM messages WHERE conversation_id = ?').run(id);
      this.db.prepare('DELETE FROM conversations WHERE id = ?').run(id);
      return removed.changes;
    });
  }

  create(conversation: NewConversation): Conversation {
    const now = new Date().toISOString();
    const row: ConversationRecord = {
      id: randomUUID(),
      title: conversation.title,
      description: conversation.description,
      created_at: now,
      updated_at: now,
    };

    this.db
      .prepare(`
      INSERT INTO conversations (id, title, description, created_at, updated_at)
      VALUES (@id, @title, @description, @created_at, @updated_at)
    `)
      .run(row);

    return toConversation(row);
  }

  findById(id: string): Conversation | null {
    const row = this.db
      .prepare<[string], ConversationRecord>('SELECT * FROM conversations WHERE id = ?')
      .get(id);
    return row ? toConversation(row) : null;
  }

  update(id: string, changes: ConversationChanges): Conversation | null {
    const current = this.findById(id);
    if (!current) {
      return null;
    }

    this.db
      .prepare(`
      UPDATE conversations
      SET title = ?, description = ?, updated_at = ?
      WHERE id = ?
    `)
      .run(
        changes.title !== undefined ? changes.title : current.title,
        changes.description ?? current.description,
        new Date().toISOString(),
        id
      );

    return this.findById(id);
  }

  deleteWithMessages(id: string): number {
    return this.cascadeDelete(id);
  }
}
