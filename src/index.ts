import express, { Request, Response, NextFunction } from 'express';
import mongoose from 'mongoose';
import cors from 'cors';
import { config } from './core/config';
import { logger } from './core/logger';
import { DeskError, ValidationError, errorMessage } from './core/errors';
import { CommandService, commandService } from './services/command.service';
import { CommandReply } from './types';
import { maskSensitiveData, secureLog, validateInput } from './utils/security';
import './models';

function commandText(body: unknown): string {
  const text = typeof body === 'object' && body !== null && 'text' in body ? body.text : undefined;
  if (typeof text !== 'string' || !text.trim()) {
    throw new ValidationError('A non-empty "text" field is required');
  }
  return validateInput(text);
}

function sendReply(res: Response, reply: CommandReply): void {
  if (reply.kind === 'text') {
    res.json({
      success: true,
      data: { text: reply.text },
      metadata: { timestamp: new Date().toISOString() },
    });
    return;
  }

  res
    .status(200)
    .type('application/pdf')
    .set({
      'Content-Disposition': `attachment; filename="${reply.fileName}"`,
      'X-Report-Caption': encodeURIComponent(reply.caption),
    })
    .send(reply.content);
}

// body-parser marks a malformed JSON body with `type: 'entity.parse.failed'` and status 400
function isMalformedBody(error: Error): boolean {
  return 'type' in error && error.type === 'entity.parse.failed' && 'status' in error && error.status === 400;
}

function handleError(thrown: Error, req: Request, res: Response, _next: NextFunction): void {
  const error = isMalformedBody(thrown) ? new ValidationError('Request body must be valid JSON') : thrown;
  const known = error instanceof DeskError;
  secureLog({
    message: `Request to ${req.path} failed: ${error.message}`,
    code: known ? error.code : 'INTERNAL_ERROR',
    stack: known ? undefined : error.stack,
  }, known ? 'warn' : 'error');

  const status = known ? error.statusCode : 500;
  const message = known ? error.message : 'Internal server error';
  res.status(status).json({
    success: false,
    message,
    error: {
      message,
      code: known ? error.code : 'INTERNAL_ERROR',
      ...(known && error.details ? { details: error.details } : {}),
    },
  });
}

export function createApp(commands: CommandService = commandService) {
  const app = express();

  app.use(cors({ origin: '*', methods: ['GET', 'POST', 'OPTIONS'] }));
  app.use(express.json({ limit: '1mb' }));
  app.use((req: Request, _res: Response, next: NextFunction) => {
    secureLog({ message: 'Incoming request', method: req.method, path: req.path, ip: req.ip }, 'debug');
    next();
  });

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'healthy', timestamp: new Date().toISOString(), uptime: process.uptime() });
  });

  // Chat-platform adapters post each incoming message here and relay the reply
  app.post('/commands', async (req: Request, res: Response, next: NextFunction) => {
    try {
      sendReply(res, await commands.handle(commandText(req.body)));
    } catch (error) {
      next(error);
    }
  });

  app.use(handleError);
  return app;
}

async function startServer() {
  await mongoose.connect(config.mongodb.uri, { dbName: config.mongodb.dbName });
  secureLog({ message: 'Task store connected', uri: maskSensitiveData(config.mongodb.uri) }, 'info');

  createApp().listen(config.server.port, () => {
    logger.info('Claims desk server started', { port: config.server.port, env: config.server.env });
  });
}

if (require.main === module) {
  startServer().catch((error: unknown) => {
    logger.error('Failed to start claims desk server', { error: maskSensitiveData(errorMessage(error)) });
    process.exit(1);
  });
}
