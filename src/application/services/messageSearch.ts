import { Message } from '../../core/entities/Message.js';

export interface MessageFilter {
  q?: string;
  role?: string;
}

export function compareMessages(a: Message, b: Message): number {
  const byTime = a.createdAt.getTime() - b.createdAt.getTime();
  return byTime !== 0 ? byTime : a.sequence - b.sequence;
}

/**
 * Orders messages oldest first and applies the text and role filters
 * (both must hold). Empty filter values are ignored.
 */
export function selectMessages(messages: readonly Message[], filter: MessageFilter): Message[] {
  const needle = filter.q ? filter.q.toLowerCase() : null;
  const role = filter.role || null;

  return [...messages]
    .sort(compareMessages)
    .filter((message) => needle === null || message.text.toLowerCase().includes(needle))
    .filter((message) => role === null || message.role === role);
}
