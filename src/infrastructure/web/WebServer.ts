import express, { Express, NextFunction, Request, Response } from 'express';
import { Server as HttpServer } from 'http';
import cors from 'cors';
import type { ConversationService } from '../../application/services/ConversationService.js';
import type { MessageService } from '../../application/services/MessageService.js';
import type { ILogger } from '../../core/interfaces/ILogger.js';
import { AppError, MethodNotAllowedError, ValidationError } from '../../core/errors/AppError.js';
import { toConversationView, toMessageView } from '../../application/dto/views.js';
import { PageLinkBuilder } from '../../utils/pagination.js';
import { UNEXPECTED_ERROR_DETAIL, sendError, sendResult, sendSuccess } from './envelope.js';
import { requireApiKey } from './middleware/apiKeyAuth.js';
import { validateIdentifiers } from './middleware/validateIdentifiers.js';

export interface WebServerOptions {
  apiKey: string;
  logger: ILogger;
  port?: number;
  host?: string;
  serviceName?: string;
  version?: string;
  statistics?: () => Record<string, number>;
}

const JSON_BODY_LIMIT = '1mb';

function isMalformedJson(err: unknown): boolean {
  return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';
}

/**
 * Status of a client error raised by body parsing (too large, unsupported
 * charset or encoding), or null for anything else.
 */
function clientErrorStatus(err: unknown): number | null {
  if (err instanceof Error && 'status' in err && typeof err.status === 'number') {
    return err.status >= 400 && err.status < 500 ? err.status : null;
  }
  return null;
}

/** Scheme and host of the request, or '' when the Host header is unusable. */
function requestOrigin(req: Request): string {
  const host = req.get('host');
  if (!host) {
    return '';
  }
  const origin = `${req.protocol}://${host}`;
  return URL.canParse(origin) ? new URL(origin).origin : '';
}

/**
 * Links to other pages of the current request: same path and query, with
 * `page` replaced (and dropped for the first page). Links are relative when
 * the request carries no usable Host.
 */
function pageLinksFor(req: Request): PageLinkBuilder {
  const current = new URL(req.originalUrl, 'http://localhost');
  const origin = requestOrigin(req);
  return (page: number) => {
    const url = new URL(current.href);
    if (page === 1) {
      url.searchParams.delete('page');
    } else {
      url.searchParams.set('page', String(page));
    }
    return `${origin}${url.pathname}${url.search}`;
  };
}

export class WebServer {
  private app: Express;
  private httpServer: HttpServer | null = null;
  private readonly logger: ILogger;

  constructor(
    private conversationService: ConversationService,
    private messageService: MessageService,
    private options: WebServerOptions
  ) {
    this.logger = options.logger;
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
    this.setupErrorHandling();
  }

  private setupMiddleware(): void {
    this.app.use(cors());
    this.app.use(express.json({ limit: JSON_BODY_LIMIT }));
    this.app.use((req: Request, _res: Response, next: NextFunction) => {
      this.logger.debug('Request received', { method: req.method, path: req.path });
      next();
    });
  }

  private setupRoutes(): void {
    const auth = requireApiKey(this.options.apiKey);
    const methodNotAllowed = (req: Request, _res: Response, next: NextFunction) =>
      next(new MethodNotAllowedError(req.method));

    this.app
      .route('/health')
      .get((_req: Request, res: Response) => {
        sendSuccess(res, 200, 'Service is healthy', {
          status: 'healthy',
          service: this.options.serviceName ?? 'conversation-service',
          version: this.options.version ?? '1.0.0',
          timestamp: new Date().toISOString(),
          database: this.options.statistics ? this.options.statistics() : null,
        });
      })
      .all(methodNotAllowed);

    this.app
      .route('/conversations')
      .post(auth, (req: Request, res: Response) => {
        sendResult(res, this.conversationService.create(req.body), {
          status: 201,
          message: 'Conversation created successfully',
          view: toConversationView,
        });
      })
      .all(methodNotAllowed);

    this.app
      .route('/conversations/:id')
      .get(validateIdentifiers('id'), (req: Request, res: Response) => {
        sendResult(res, this.conversationService.get(req.params.id), {
          status: 200,
          message: 'Conversation retrieved successfully',
          view: toConversationView,
        });
      })
      .patch(auth, validateIdentifiers('id'), (req: Request, res: Response) => {
        sendResult(res, this.conversationService.update(req.params.id, req.body), {
          status: 200,
          message: 'Conversation updated successfully',
          view: toConversationView,
        });
      })
      .delete(auth, validateIdentifiers('id'), (req: Request, res: Response) => {
        sendResult(res, this.conversationService.delete(req.params.id), {
          status: 200,
          message: 'Conversation deleted successfully',
          view: () => null,
        });
      })
      .all(methodNotAllowed);

    this.app
      .route('/conversations/:id/messages')
      .get(validateIdentifiers('id'), (req: Request, res: Response) => {
        const page = this.messageService.list(
          req.params.id,
          {
            q: req.query.q,
            role: req.query.role,
            page: req.query.page,
            page_size: req.query.page_size,
          },
          pageLinksFor(req)
        );
        sendSuccess(res, 200, 'Messages retrieved successfully', {
          ...page,
          results: page.results.map(toMessageView),
        });
      })
      .post(auth, validateIdentifiers('id'), (req: Request, res: Response) => {
        sendResult(res, this.messageService.create(req.params.id, req.body), {
          status: 201,
          message: 'Message created successfully',
          view: toMessageView,
        });
      })
      .all(methodNotAllowed);

    this.app
      .route('/conversations/:id/messages/:message_id')
      .get(validateIdentifiers('id', 'message_id'), (req: Request, res: Response) => {
        sendResult(res, this.messageService.get(req.params.id, req.params.message_id), {
          status: 200,
          message: 'Message retrieved successfully',
          view: toMessageView,
        });
      })
      .delete(auth, validateIdentifiers('id', 'message_id'), (req: Request, res: Response) => {
        sendResult(res, this.messageService.delete(req.params.id, req.params.message_id), {
          status: 200,
          message: 'Message deleted successfully',
          view: () => null,
        });
      })
      .all(methodNotAllowed);
  }

  private setupErrorHandling(): void {
    this.app.use((req: Request, res: Response) => {
      sendError(res, 404, { detail: `Endpoint not found: ${req.method} ${req.path}` });
    });

    // Only place where a thrown error becomes a wire response
    this.app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
      if (res.headersSent) {
        next(err);
        return;
      }

      const error = isMalformedJson(err)
        ? new ValidationError({ detail: 'Malformed JSON request body' })
        : err;

      if (error instanceof AppError) {
        sendError(res, error.statusCode, error.details);
        return;
      }

      const clientStatus = clientErrorStatus(error);
      if (clientStatus !== null && error instanceof Error) {
        sendError(res, clientStatus, { detail: error.message });
        return;
      }

      this.logger.error('Unhandled exception', {
        method: req.method,
        path: req.path,
        error: error instanceof Error ? error.message : String(error),
        stack: error instanceof Error ? error.stack : undefined,
      });
      sendError(res, 500, { detail: UNEXPECTED_ERROR_DETAIL });
    });
  }

  public getPort(): number | null {
    const address = this.httpServer?.address();
    return address && typeof address === 'object' ? address.port : null;
  }

  public start(): Promise<void> {
    const port = this.options.port ?? 8000;
    const host = this.options.host ?? '0.0.0.0';

    return new Promise((resolve, reject) => {
      const server = this.app.listen(port, host, () => {
        this.logger.info(`API available at http://${host}:${this.getPort() ?? port}`);
        resolve();
      });

      server.on('error', (error) => {
        this.logger.error('Server error', { error: error.message });
        reject(error);
      });

      this.httpServer = server;
    });
  }

  public stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      if (!this.httpServer) {
        resolve();
        return;
      }

      this.httpServer.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        this.logger.info('HTTP server closed');
        this.httpServer = null;
        resolve();
      });
    });
  }
}
