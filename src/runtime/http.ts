import http from 'node:http';
import { createLogger, type Logger } from '../utils/logger.js';
import type { TrialSupervisor } from '../orchestration/trial-supervisor.js';
import { TaskNotFoundError } from '../orchestration/task-registry.js';
import { TrialRequestError } from '../orchestration/requests.js';
import type { TaskKind } from '../orchestration/types.js';
import { describeError } from '../trial/errors.js';

export interface ApiResponse {
  success: boolean;
  data?: Record<string, unknown>;
  error?: string;
  message?: string;
}

export interface HttpServerOptions {
  host?: string;
  port: number;
  logger?: Logger;
}

const MAX_BODY_BYTES = 1_000_000;

class HttpRequestError extends Error {
  constructor(readonly statusCode: number, message: string) {
    super(message);
    this.name = 'HttpRequestError';
  }
}

const setSecurityHeaders = (res: http.ServerResponse) => {
  res.setHeader('content-type', 'application/json');
  res.setHeader('cache-control', 'no-store, no-cache, must-revalidate');
  res.setHeader('pragma', 'no-cache');
  res.setHeader('x-content-type-options', 'nosniff');
};

const writeJson = (res: http.ServerResponse, statusCode: number, body: ApiResponse | Record<string, unknown>) => {
  setSecurityHeaders(res);
  res.statusCode = statusCode;
  res.end(JSON.stringify(body));
};

const readJsonBody = (req: http.IncomingMessage): Promise<unknown> => {
  return new Promise((resolve, reject) => {
    const contentType = req.headers['content-type'];
    if (!contentType || !contentType.includes('application/json')) {
      reject(new HttpRequestError(415, 'invalid_content_type'));
      req.resume();
      return;
    }

    let body = '';
    req.setEncoding('utf8');
    req.on('data', (chunk: string) => {
      body += chunk;
      if (body.length > MAX_BODY_BYTES) {
        reject(new HttpRequestError(413, 'payload_too_large'));
        req.destroy();
      }
    });

    req.on('end', () => {
      if (!body) {
        resolve({});
        return;
      }
      try {
        resolve(JSON.parse(body));
      } catch {
        reject(new HttpRequestError(400, 'invalid_json'));
      }
    });

    req.on('error', reject);
  });
};

const startRoute = (pathname: string): TaskKind | null => {
  const match = pathname.match(/^\/api\/v1\/(mining|backtest)\/start$/);
  if (!match) return null;
  return match[1] === 'mining' ? 'mining' : 'backtest';
};

const taskRoute = (pathname: string) => {
  const match = pathname.match(/^\/api\/v1\/(?:tasks|mining|backtest)\/([^/]+)$/);
  if (!match) return null;
  try {
    return decodeURIComponent(match[1]);
  } catch {
    return null;
  }
};

const statusForError = (error: unknown) => {
  if (error instanceof TaskNotFoundError) return 404;
  if (error instanceof HttpRequestError) return error.statusCode;
  if (error instanceof TrialRequestError) return 400;
  return 500;
};

export const createHttpServer = (supervisor: TrialSupervisor, options: HttpServerOptions) => {
  const logger = options.logger ?? createLogger('runtime.http');

  const handle = async (req: http.IncomingMessage, res: http.ServerResponse) => {
    const url = new URL(req.url || '/', `http://127.0.0.1:${options.port || 80}`);
    const pathname = url.pathname.replace(/\/+$/, '') || '/';

    if (req.method === 'GET' && pathname === '/health') {
      writeJson(res, 200, {
        status: 'healthy',
        uptime: process.uptime(),
        timestamp: new Date().toISOString(),
        tasks: supervisor.statusCounts(),
      });
      return;
    }

    if (req.method === 'GET' && (pathname === '/api/v1/tasks' || pathname === '/api/v1/mining/tasks/list')) {
      writeJson(res, 200, { success: true, data: { tasks: supervisor.listTasks() } });
      return;
    }

    const kind = startRoute(pathname);
    if (kind) {
      if (req.method !== 'POST') {
        writeJson(res, 405, { success: false, error: 'Method Not Allowed' });
        return;
      }
      const body = await readJsonBody(req);
      const taskId = supervisor.startTrial(kind, body);
      writeJson(res, 200, {
        success: true,
        data: { taskId, task: supervisor.getTask(taskId) },
        message: kind === 'mining' ? 'Experiment started' : 'Backtest started',
      });
      return;
    }

    const taskId = taskRoute(pathname);
    if (taskId) {
      if (req.method === 'GET') {
        writeJson(res, 200, { success: true, data: { task: supervisor.getTask(taskId) } });
        return;
      }
      if (req.method === 'DELETE') {
        const result = supervisor.cancelTask(taskId);
        writeJson(res, 200, {
          success: true,
          data: { ...result },
          message: result.cancelled ? 'Task cancelled' : `Task already ${result.status}`,
        });
        return;
      }
      writeJson(res, 405, { success: false, error: 'Method Not Allowed' });
      return;
    }

    writeJson(res, 404, { success: false, error: 'Not Found' });
  };

  const server = http.createServer((req, res) => {
    handle(req, res).catch((error: unknown) => {
      const statusCode = statusForError(error);
      if (statusCode >= 500) {
        logger.error(`${req.method} ${req.url} failed`, error);
      }
      if (res.headersSent) {
        res.end();
        return;
      }
      writeJson(res, statusCode, { success: false, error: describeError(error) });
    });
  });

  return new Promise<http.Server>((resolve, reject) => {
    server.once('error', reject);
    server.listen(options.port, options.host ?? '127.0.0.1', () => {
      server.off('error', reject);
      const address = server.address();
      const boundPort = typeof address === 'object' && address ? address.port : options.port;
      logger.info(`HTTP API listening on ${options.host ?? '127.0.0.1'}:${boundPort}`);
      resolve(server);
    });
  });
};
