import { IConversationRepository } from '../../core/interfaces/IConversationRepository.js';
import { IMessageRepository } from '../../core/interfaces/IMessageRepository.js';
import { ILogger } from '../../core/interfaces/ILogger.js';
import { Message } from '../../core/entities/Message.js';
import { ServiceResult, invalid, notFound, ok } from '../../core/entities/Result.js';
import {
  AssistantResponder,
  generateAssistantReply,
} from '../../core/assistant/AssistantResponder.js';
import {
  DEFAULT_PAGE_SIZE,
  Page,
  PageLinkBuilder,
  defaultPageLink,
  paginate,
  parsePageRequest,
} from '../../utils/pagination.js';
import { createMessageSchema, toValidationDetails } from '../validation/schemas.js';
import { selectMessages } from './messageSearch.js';

export interface ListMessagesQuery {
  q?: unknown;
  role?: unknown;
  page?: unknown;
  page_size?: unknown;
}

export interface MessageServiceOptions {
  responder?: AssistantResponder;
  defaultPageSize?: number;
}

/**
 * Service for managing the messages of a conversation
 */
export class MessageService {
  private readonly responder: AssistantResponder;
  private readonly defaultPageSize: number;

  constructor(
    private conversationRepo: IConversationRepository,
    private messageRepo: IMessageRepository,
    private logger: ILogger,
    options: MessageServiceOptions = {}
  ) {
    this.responder = options.responder ?? generateAssistantReply;
    this.defaultPageSize = options.defaultPageSize ?? DEFAULT_PAGE_SIZE;
  }

  /**
   * Add a message, validated from an untrusted payload, to a conversation.
   * A user message is answered in-line by the assistant; see
   * {@link replyAsAssistant}.
   */
  create(conversationId: string, input: unknown): ServiceResult<Message> {
    if (!this.conversationRepo.findById(conversationId)) {
      return notFound('conversation', conversationId);
    }

    const parsed = createMessageSchema.safeParse(input);
    if (!parsed.success) {
      return invalid(toValidationDetails(parsed.error));
    }

    const message = this.messageRepo.create({
      conversationId,
      role: parsed.data.role,
      text: parsed.data.text,
    });

    if (message.role === 'user') {
      this.replyAsAssistant(message);
    }

    return ok(message);
  }

  /**
   * Filtered, paginated messages of a conversation. An unknown
   * conversation simply has no messages.
   */
  list(
    conversationId: string,
    query: ListMessagesQuery = {},
    linkFor: PageLinkBuilder = defaultPageLink
  ): Page<Message> {
    const selected = selectMessages(this.messageRepo.listByConversation(conversationId), {
      q: typeof query.q === 'string' ? query.q : undefined,
      role: typeof query.role === 'string' ? query.role : undefined,
    });

    return paginate(selected, parsePageRequest(query, this.defaultPageSize), linkFor);
  }

  get(conversationId: string, messageId: string): ServiceResult<Message> {
    const message = this.messageRepo.findInConversation(conversationId, messageId);
    return message ? ok(message) : notFound('message', messageId);
  }

  delete(conversationId: string, messageId: string): ServiceResult<null> {
    if (!this.messageRepo.findInConversation(conversationId, messageId)) {
      return notFound('message', messageId);
    }

    this.messageRepo.delete(messageId);
    return ok(null);
  }

  /**
   * Secondary effect of creating a user message. A failure here is logged
   * and dropped: the user message is already stored and is still returned.
   */
  private replyAsAssistant(userMessage: Message): void {
    try {
      const reply = this.responder(userMessage.text);
      this.messageRepo.create({
        conversationId: userMessage.conversationId,
        role: 'assistant',
        text: reply,
      });
    } catch (error) {
      this.logger.error('Failed to generate assistant response', {
        conversationId: userMessage.conversationId,
        messageId: userMessage.id,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
