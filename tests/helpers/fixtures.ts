import { DatabaseConnection } from '../../src/infrastructure/database/DatabaseConnection.js';
import { ConversationRepository } from '../../src/infrastructure/database/repositories/ConversationRepository.js';
import { MessageRepository } from '../../src/infrastructure/database/repositories/MessageRepository.js';
import { ConversationService } from '../../src/application/services/ConversationService.js';
import { MessageService, MessageServiceOptions } from '../../src/application/services/MessageService.js';
import { ILogger } from '../../src/core/interfaces/ILogger.js';
import { ServiceResult } from '../../src/core/entities/Result.js';

export interface MockLogger extends ILogger {
  debug: jest.Mock;
  info: jest.Mock;
  warn: jest.Mock;
  error: jest.Mock;
}

export function createMockLogger(): MockLogger {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  };
}

export interface TestContext {
  connection: DatabaseConnection;
  conversationRepo: ConversationRepository;
  messageRepo: MessageRepository;
  conversationService: ConversationService;
  messageService: MessageService;
  logger: MockLogger;
}

/**
 * Services wired to a fresh in-memory database
 */
export function createTestContext(options: MessageServiceOptions = {}): TestContext {
  const connection = new DatabaseConnection(':memory:');
  const db = connection.getDatabase();
  const conversationRepo = new ConversationRepository(db);
  const messageRepo = new MessageRepository(db);
  const logger = createMockLogger();

  return {
    connection,
    conversationRepo,
    messageRepo,
    conversationService: new ConversationService(conversationRepo, logger),
    messageService: new MessageService(conversationRepo, messageRepo, logger, options),
    logger,
  };
}

export function unwrap<T>(result: ServiceResult<T>): T {
  if (!result.ok) {
    throw new Error(`Expected success, got ${JSON.stringify(result.error)}`);
  }
  return result.value;
}
