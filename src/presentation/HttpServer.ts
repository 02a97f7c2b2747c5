import { createServer, IncomingMessage, ServerResponse } from 'http';
import type { z } from 'zod';
import type { SourceDocument } from '../domain/entities/DocumentChunk.js';
import type { ILogger } from '../domain/ports/ILogger.js';
import { describeIssues } from '../infrastructure/utils/validation.js';
import { conversationRequestSchema, knowledgeRequestSchema } from './requestSchemas.js';
import type { TravelAgent } from './TravelAgent.js';

export interface HttpServerConfig {
  port: number;
  host?: string;
  /** Maximum accepted request body, in bytes */
  maxBodyBytes?: number;
}

/**
 * Raised for requests the server refuses with a 4xx status
 */
export class BadRequestError extends Error {
  constructor(
    message: string,
    readonly status: number = 400
  ) {
    super(message);
    this.name = 'BadRequestError';
  }
}

const DEFAULT_MAX_BODY_BYTES = 1024 * 1024;

/**
 * Validate a body against a request schema, answering 400 with the first issue
 */
export function parseRequest<S extends z.ZodTypeAny>(schema: S, body: unknown): z.output<S> {
  const result = schema.safeParse(body);
  if (!result.success) {
    throw new BadRequestError(describeIssues(result.error));
  }
  return result.data;
}

/**
 * Validate the body of POST /api/knowledge
 */
export function parseDocuments(body: unknown): SourceDocument[] {
  return parseRequest(knowledgeRequestSchema, body).documents.map(({ id, text, metadata }) => ({
    id,
    text,
    ...(metadata && { metadata }),
  }));
}

/**
 * HTTP Server for REST API access to the agent
 */
export class HttpServer {
  private server: ReturnType<typeof createServer> | null = null;

  constructor(
    private readonly agent: TravelAgent,
    private readonly logger: ILogger,
    private readonly config: HttpServerConfig
  ) {}

  /**
   * Start the HTTP server
   */
  start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = createServer((req, res) => {
        void this.handleRequest(req, res);
      });
      this.server = server;

      server.once('error', reject);
      server.listen(this.config.port, this.config.host ?? '0.0.0.0', () => {
        server.off('error', reject);
        this.logger.info('HTTP Server started', {
          port: this.config.port,
          host: this.config.host ?? '0.0.0.0',
        });
        resolve();
      });
    });
  }

  /**
   * Stop the HTTP server
   */
  stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = this.server;
      if (!server) {
        resolve();
        return;
      }
      server.close((error) => {
        this.server = null;
        if (error) {
          reject(error);
          return;
        }
        this.logger.info('HTTP Server stopped');
        resolve();
      });
    });
  }

  /**
   * Route one request. Never rejects: every failure is answered with a JSON error body.
   */
  async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);
    const path = url.pathname;
    const method = req.method ?? 'GET';

    this.logger.debug('HTTP Request', { method, path });

    // CORS headers
    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, DELETE, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type');

    if (method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    try {
      if (path === '/health' && method === 'GET') {
        return this.sendJson(res, 200, { status: 'healthy', timestamp: new Date().toISOString() });
      }

      if (path === '/api/status' && method === 'GET') {
        return await this.handleStatus(res);
      }

      if (path === '/api/conversation' && method === 'POST') {
        return await this.handleConversation(req, res);
      }

      if (path.startsWith('/api/conversation/') && method === 'DELETE') {
        const sessionId = decodeURIComponent(path.slice('/api/conversation/'.length));
        return await this.handleReset(res, sessionId);
      }

      if (path === '/api/knowledge' && method === 'POST') {
        return await this.handleIngest(req, res);
      }

      // 404 Not Found
      return this.sendJson(res, 404, { error: 'Not Found', path });
    } catch (error) {
      if (error instanceof BadRequestError) {
        return this.sendJson(res, error.status, { error: error.message });
      }
      this.logger.error('HTTP Request error', error, { method, path });
      return this.sendJson(res, 500, {
        error: 'Internal Server Error',
        message: error instanceof Error ? error.message : 'Unknown error',
      });
    }
  }

  private async handleStatus(res: ServerResponse): Promise<void> {
    const status = await this.agent.getStatus();
    this.sendJson(res, 200, {
      ...status,
      timestamp: new Date().toISOString(),
      sessions: this.agent.listConversations(),
    });
  }

  private async handleConversation(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const { session_id: sessionId, message_text: messageText } = parseRequest(
      conversationRequestSchema,
      await this.parseBody(req)
    );

    const response = await this.agent.handleMessage(sessionId, messageText);
    this.sendJson(res, 200, {
      session_id: response.sessionId,
      action: response.action,
      messages: response.messages,
    });
  }

  private async handleReset(res: ServerResponse, sessionId: string): Promise<void> {
    if (sessionId.length === 0) {
      throw new BadRequestError('session id is required');
    }
    const existed = await this.agent.resetConversation(sessionId);
    this.sendJson(res, existed ? 200 : 404, { session_id: sessionId, reset: existed });
  }

  private async handleIngest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const documents = parseDocuments(await this.parseBody(req));
    const result = await this.agent.ingestDocuments(documents);
    this.sendJson(res, 201, result);
  }

  private parseBody(req: IncomingMessage): Promise<unknown> {
    const limit = this.config.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;

    return new Promise((resolve, reject) => {
      let body = '';
      let size = 0;
      req.on('data', (chunk: Buffer) => {
        size += chunk.length;
        if (size > limit) {
          reject(new BadRequestError('Request body too large', 413));
          req.destroy();
          return;
        }
        body += chunk.toString();
      });
      req.on('end', () => {
        try {
          const parsed: unknown = body ? JSON.parse(body) : {};
          resolve(parsed);
        } catch {
          reject(new BadRequestError('Invalid JSON body'));
        }
      });
      req.on('error', reject);
    });
  }

  private sendJson(res: ServerResponse, status: number, data: unknown): void {
    res.writeHead(status, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(data, null, 2));
  }
}
