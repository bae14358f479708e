import { Conversation } from '../../core/entities/Conversation.js';
import { Message, MessageRole } from '../../core/entities/Message.js';

/**
 * Wire representations of the domain entities
 */
export interface ConversationView {
  id: string;
  title: string | null;
  description: string;
  created_at: string;
  updated_at: string;
}

export interface MessageView {
  id: string;
  conversation_id: string;
  role: MessageRole;
  text: string;
  created_at: string;
  updated_at: string;
}

export function toConversationView(conversation: Conversation): ConversationView {
  return {
    id: conversation.id,
    title: conversation.title,
    description: conversation.description,
    created_at: conversation.createdAt.toISOString(),
    updated_at: conversation.updatedAt.toISOString(),
  };
}

export function toMessageView(message: Message): MessageView {
  return {
    id: message.id,
    conversation_id: message.conversationId,
    role: message.role,
    text: message.text,
    created_at: message.createdAt.toISOString(),
    updated_at: message.updatedAt.toISOString(),
  };
}
