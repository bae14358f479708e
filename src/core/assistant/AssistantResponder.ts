/**
 * Keyword-based assistant replies. Rules are checked in order and the
 * first match wins. Keywords match whole words, case-insensitively.
 */
export const ASSISTANT_REPLIES = {
  greeting: 'Hello! How can I assist you today?',
  help: "I'm here to help! What do you need assistance with?",
  question: "That's an interesting question. Let me think about that...",
  gratitude: "You're welcome! Is there anything else I can help with?",
  fallback: 'I understand. Can you tell me more about that?',
} as const;

export type AssistantReplyKind = keyof typeof ASSISTANT_REPLIES;

export type AssistantResponder = (text: string) => string;

interface ReplyRule {
  kind: Exclude<AssistantReplyKind, 'fallback'>;
  matches: (lowered: string) => boolean;
}

const containsWord = (words: string[]) => {
  const pattern = new RegExp(`\\b(?:${words.join('|')})\\b`);
  return (lowered: string) => pattern.test(lowered);
};

const RULES: ReplyRule[] = [
  { kind: 'greeting', matches: containsWord(['hello', 'hi', 'hey']) },
  { kind: 'help', matches: containsWord(['help', 'support']) },
  { kind: 'question', matches: (lowered) => lowered.includes('?') },
  { kind: 'gratitude', matches: containsWord(['thank', 'thanks']) },
];

export function classifyMessage(text: string): AssistantReplyKind {
  const lowered = text.toLowerCase();
  const rule = RULES.find((candidate) => candidate.matches(lowered));
  return rule ? rule.kind : 'fallback';
}

export const generateAssistantReply: AssistantResponder = (text) =>
  ASSISTANT_REPLIES[classifyMessage(text)];
