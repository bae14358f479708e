/**
 * Conversation domain entity
 */
export interface Conversation {
  id: string;
  title: string | null;
  description: string;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Row shape of the `conversations` table
 */
export interface ConversationRecord {
  id: string;
  title: string | null;
  description: string;
  created_at: string;
  updated_at: string;
}

export interface NewConversation {
  title: string | null;
  description: string;
}

export interface ConversationChanges {
  title?: string | null;
  description?: string;
}
