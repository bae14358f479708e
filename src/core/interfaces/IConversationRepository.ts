import { Conversation, ConversationChanges, NewConversation } from '../entities/Conversation.js';

/**
 * Interface for conversation persistence
 */
export interface IConversationRepository {
  create(conversation: NewConversation): Conversation;

  findById(id: string): Conversation | null;

  update(id: string, changes: ConversationChanges): Conversation | null;

  /**
   * Removes the conversation and every message it owns in one transaction.
   * Returns the number of messages removed.
   */
  deleteWithMessages(id: string): number;
}
