import { Message, NewMessage } from '../entities/Message.js';

/**
 * Interface for message persistence
 */
export interface IMessageRepository {
  create(message: NewMessage): Message;

  findInConversation(conversationId: string, messageId: string): Message | null;

  listByConversation(conversationId: string): Message[];

  delete(messageId: string): boolean;
}
