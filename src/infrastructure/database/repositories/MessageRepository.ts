import Database from 'better-sqlite3';
import { randomUUID } from 'crypto';
import { IMessageRepository } from '../../../core/interfaces/IMessageRepository.js';
import { Message, MessageRecord, NewMessage, isMessageRole } from '../../../core/entities/Message.js';

function toMessage(row: MessageRecord): Message {
  if (!isMessageRole(row.role)) {
    throw new Error(`Stored message ${row.id} has unknown role "${row.role}"`);
  }
  return {
    id: row.id,
    conversationId: row.conversation_id,
    role: row.role,
    text: row.text,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
    sequence: row.seq,
  };
}

/**
 * SQLite implementation of message repository
 */
export class MessageRepository implements IMessageRepository {
  constructor(private db: Database.Database) {}

  create(message: NewMessage): Message {
    const now = new Date().toISOString();
    const id = randomUUID();

    const result = this.db
      .prepare(`
      INSERT INTO messages (id, conversation_id, role, text, created_at, updated_at)
      VALUES (?, ?, ?, ?, ?, ?)
    `)
      .run(id, message.conversationId, message.role, message.text, now, now);

    return {
      id,
      conversationId: message.conversationId,
      role: message.role,
      text: message.text,
      createdAt: new Date(now),
      updatedAt: new Date(now),
      sequence: Number(result.lastInsertRowid),
    };
  }

  findInConversation(conversationId: string, messageId: string): Message | null {
    const row = this.db
      .prepare<[string, string], MessageRecord>(
        'SELECT * FROM messages WHERE id = ? AND conversation_id = ?'
      )
      .get(messageId, conversationId);
    return row ? toMessage(row) : null;
  }

  listByConversation(conversationId: string): Message[] {
    return this.db
      .prepare<[string], MessageRecord>(`
      SELECT * FROM messages
      WHERE conversation_id = ?
      ORDER BY created_at, seq
    `)
      .all(conversationId)
      .map(toMessage);
  }

  delete(messageId: string): boolean {
    return this.db.prepare('DELETE FROM messages WHERE id = ?').run(messageId).changes > 0;
  }
}
