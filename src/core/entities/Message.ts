/**
 * Message domain entity
 */
export const MESSAGE_ROLES = ['user', 'assistant'] as const;

export type MessageRole = (typeof MESSAGE_ROLES)[number];

export interface Message {
  id: string;
  conversationId: string;
  role: MessageRole;
  text: string;
  createdAt: Date;
  updatedAt: Date;
  sequence: number; // insertion order, tiebreaker for equal timestamps
}

export interface MessageRecord {
  seq: number;
  id: string;
  conversation_id: string;
  role: string;
  text: string;
  created_at: string;
  updated_at: string;
}

export interface NewMessage {
  conversationId: string;
  role: MessageRole;
  text: string;
}

export function isMessageRole(value: unknown): value is MessageRole {
  return MESSAGE_ROLES.some((role) => role === value);
}
