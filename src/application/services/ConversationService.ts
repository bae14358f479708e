import { IConversationRepository } from '../../core/interfaces/IConversationRepository.js';
import { ILogger } from '../../core/interfaces/ILogger.js';
import { Conversation } from '../../core/entities/Conversation.js';
import { ServiceResult, invalid, notFound, ok } from '../../core/entities/Result.js';
import {
  createConversationSchema,
  toValidationDetails,
  updateConversationSchema,
} from '../validation/schemas.js';

/**
 * Service for managing conversations
 */
export class ConversationService {
  private readonly LARGE_CASCADE_THRESHOLD = 100;

  constructor(
    private conversationRepo: IConversationRepository,
    private logger: ILogger
  ) {}

  /**
   * Create a conversation from an untrusted payload
   */
  create(input: unknown): ServiceResult<Conversation> {
    const parsed = createConversationSchema.safeParse(input);
    if (!parsed.success) {
      return invalid(toValidationDetails(parsed.error));
    }

    const conversation = this.conversationRepo.create({
      title: parsed.data.title ?? null,
      description: parsed.data.description,
    });

    this.logger.info('Conversation created', { conversationId: conversation.id });
    return ok(conversation);
  }

  /**
   * Get a conversation by id
   */
  get(id: string): ServiceResult<Conversation> {
    const conversation = this.conversationRepo.findById(id);
    return conversation ? ok(conversation) : notFound('conversation', id);
  }

  /**
   * Change the title and/or description of a conversation from an
   * untrusted payload
   */
  update(id: string, input: unknown): ServiceResult<Conversation> {
    if (!this.conversationRepo.findById(id)) {
      return notFound('conversation', id);
    }

    const parsed = updateConversationSchema.safeParse(input);
    if (!parsed.success) {
      return invalid(toValidationDetails(parsed.error));
    }

    const updated = this.conversationRepo.update(id, {
      ...(parsed.data.title !== undefined && { title: parsed.data.title }),
      ...(parsed.data.description !== undefined && { description: parsed.data.description }),
    });
    return updated ? ok(updated) : notFound('conversation', id);
  }

  /**
   * Delete a conversation together with all of its messages
   */
  delete(id: string): ServiceResult<null> {
    if (!this.conversationRepo.findById(id)) {
      return notFound('conversation', id);
    }

    const removedMessages = this.conversationRepo.deleteWithMessages(id);

    if (removedMessages > this.LARGE_CASCADE_THRESHOLD) {
      this.logger.warn('Large conversation deleted', {
        conversationId: id,
        messageCount: removedMessages,
      });
    }
    this.logger.info('Conversation deleted', { conversationId: id, messageCount: removedMessages });

    return ok(null);
  }
}
