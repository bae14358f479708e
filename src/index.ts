#!/usr/bin/env node

/**
 * Conversation Service - Entry Point
 */

import { getConfig, printConfigInfo } from './config.js';
import { initializeDatabase, closeDatabase } from './infrastructure/database/DatabaseConnection.js';
import { ConversationRepository } from './infrastructure/database/repositories/ConversationRepository.js';
import { MessageRepository } from './infrastructure/database/repositories/MessageRepository.js';
import { ConsoleLogger } from './infrastructure/logging/ConsoleLogger.js';
import { ConversationService } from './application/services/ConversationService.js';
import { MessageService } from './application/services/MessageService.js';
import { WebServer } from './infrastructure/web/WebServer.js';

async function main() {
  let webServer: WebServer | null = null;
  const logger = new ConsoleLogger('Main');

  try {
    const config = getConfig();
    printConfigInfo(config);

    const connection = initializeDatabase(config.database.path);
    const db = connection.getDatabase();
    const conversationRepo = new ConversationRepository(db);
    const messageRepo = new MessageRepository(db);

    const serviceLogger = new ConsoleLogger('Conversations', config.server.debug);
    const conversationService = new ConversationService(conversationRepo, serviceLogger);
    const messageService = new MessageService(conversationRepo, messageRepo, serviceLogger, {
      defaultPageSize: config.pagination.defaultPageSize,
    });

    webServer = new WebServer(conversationService, messageService, {
      apiKey: config.auth.apiKey,
      port: config.http.port,
      host: config.http.host,
      serviceName: config.server.name,
      version: config.server.version,
      logger: serviceLogger.child('WebServer'),
      statistics: () => connection.getStatistics(),
    });
    await webServer.start();

    const server = webServer;
    const shutdown = async (signal: string) => {
      logger.info(`Received ${signal}, shutting down gracefully...`);
      try {
        await server.stop();
      } catch (error) {
        logger.error('Failed to stop HTTP server', {
          error: error instanceof Error ? error.message : String(error),
        });
      }
      closeDatabase();
      process.exit(0);
    };

    process.on('SIGINT', () => void shutdown('SIGINT'));
    process.on('SIGTERM', () => void shutdown('SIGTERM'));
  } catch (error) {
    logger.error('Fatal error in main()', {
      error: error instanceof Error ? error.message : String(error),
    });

    if (webServer) {
      await webServer.stop();
    }
    closeDatabase();

    process.exit(1);
  }
}

void main();
