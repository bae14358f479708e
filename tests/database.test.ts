import { DatabaseConnection } from '../src/infrastructure/database/DatabaseConnection.js';
import { ConversationRepository } from '../src/infrastructure/database/repositories/ConversationRepository.js';
import { MessageRepository } from '../src/infrastructure/database/repositories/MessageRepository.js';

describe('SQLite repositories', () => {
  let connection: DatabaseConnection;
  let conversations: ConversationRepository;
  let messages: MessageRepository;

  beforeEach(() => {
    // Use in-memory database for tests
    connection = new DatabaseConnection(':memory:');
    conversations = new ConversationRepository(connection.getDatabase());
    messages = new MessageRepository(connection.getDatabase());
  });

  afterEach(() => {
    if (connection) {
      connection.close();
    }
  });

  describe('ConversationRepository', () => {
    test('should create and retrieve a conversation', () => {
      const created = conversations.create({ title: 'Trip', description: 'Planning the trip' });
      const found = conversations.findById(created.id);

      expect(found).toEqual(created);
      expect(found?.title).toBe('Trip');
      expect(found?.description).toBe('Planning the trip');
      expect(found?.createdAt.getTime()).toBe(found?.updatedAt.getTime());
    });

    test('should store a missing title as null', () => {
      const created = conversations.create({ title: null, description: 'No title' });
      expect(conversations.findById(created.id)?.title).toBeNull();
    });

    test('should generate distinct UUID identifiers', () => {
      const ids = new Set(
        Array.from({ length: 20 }, () => conversations.create({ title: null, description: 'x' }).id)
      );
      expect(ids.size).toBe(20);
      ids.forEach((id) => expect(id).toMatch(/^[0-9a-f-]{36}$/));
    });

    test('should return null for non-existent conversation', () => {
      expect(conversations.findById('00000000-0000-4000-8000-000000000000')).toBeNull();
    });

    test('should update fields and keep the creation timestamp', () => {
      const created = conversations.create({ title: 'Old', description: 'Old description' });
      const updated = conversations.update(created.id, { description: 'New description' });

      expect(updated?.title).toBe('Old');
      expect(updated?.description).toBe('New description');
      expect(updated?.createdAt.getTime()).toBe(created.createdAt.getTime());
      expect(updated?.updatedAt.getTime()).toBeGreaterThanOrEqual(created.updatedAt.getTime());
    });

    test('should clear the title when updated to null', () => {
      const created = conversations.create({ title: 'Old', description: 'd' });
      expect(conversations.update(created.id, { title: null })?.title).toBeNull();
    });

    test('should return null when updating a missing conversation', () => {
      expect(conversations.update('00000000-0000-4000-8000-000000000000', { title: 'x' })).toBeNull();
    });

    test('should delete a conversation with all its messages', () => {
      const kept = conversations.create({ title: null, description: 'kept' });
      const doomed = conversations.create({ title: null, description: 'doomed' });
      messages.create({ conversationId: doomed.id, role: 'user', text: 'one' });
      messages.create({ conversationId: doomed.id, role: 'assistant', text: 'two' });
      messages.create({ conversationId: kept.id, role: 'user', text: 'stays' });

      expect(conversations.deleteWithMessages(doomed.id)).toBe(2);
      expect(conversations.findById(doomed.id)).toBeNull();
      expect(messages.listByConversation(doomed.id)).toHaveLength(0);
      expect(messages.listByConversation(kept.id)).toHaveLength(1);
    });
  });

  describe('MessageRepository', () => {
    let conversationId: string;

    beforeEach(() => {
      conversationId = conversations.create({ title: null, description: 'Messages' }).id;
    });

    test('should save and retrieve a single message', () => {
      const created = messages.create({ conversationId, role: 'user', text: 'Hello' });
      const found = messages.findInConversation(conversationId, created.id);

      expect(found).toEqual(created);
      expect(found?.role).toBe('user');
      expect(found?.text).toBe('Hello');
    });

    test('should not find a message through another conversation', () => {
      const other = conversations.create({ title: null, description: 'Other' }).id;
      const created = messages.create({ conversationId, role: 'user', text: 'Hello' });

      expect(messages.findInConversation(other, created.id)).toBeNull();
    });

    test('should retrieve messages in insertion order', () => {
      for (let i = 0; i < 5; i++) {
        messages.create({ conversationId, role: 'user', text: `Message ${i}` });
      }

      const listed = messages.listByConversation(conversationId);
      expect(listed.map((m) => m.text)).toEqual([
        'Message 0',
        'Message 1',
        'Message 2',
        'Message 3',
        'Message 4',
      ]);
      expect(listed[4].sequence).toBeGreaterThan(listed[0].sequence);
    });

    test('should reject a message for a missing conversation', () => {
      expect(() =>
        messages.create({
          conversationId: '00000000-0000-4000-8000-000000000000',
          role: 'user',
          text: 'orphan',
        })
      ).toThrow(/FOREIGN KEY/);
    });

    test('should delete a message', () => {
      const created = messages.create({ conversationId, role: 'user', text: 'bye' });

      expect(messages.delete(created.id)).toBe(true);
      expect(messages.delete(created.id)).toBe(false);
      expect(messages.findInConversation(conversationId, created.id)).toBeNull();
    });

    test('should handle special characters in messages', () => {
      const specialMessage = 'Hello "World" with \'quotes\' and <tags> & symbols!';
      const created = messages.create({ conversationId, role: 'user', text: specialMessage });

      expect(messages.findInConversation(conversationId, created.id)?.text).toBe(specialMessage);
    });
  });

  test('should get database statistics', () => {
    const conversation = conversations.create({ title: null, description: 'Stats' });
    messages.create({ conversationId: conversation.id, role: 'user', text: 'a' });
    messages.create({ conversationId: conversation.id, role: 'assistant', text: 'b' });

    const stats = connection.getStatistics();
    expect(stats.totalConversations).toBe(1);
    expect(stats.totalMessages).toBe(2);
    expect(stats.databaseSize).toBe(0);
  });
});
