import type { Server as HttpServer, IncomingMessage } from 'node:http';
import type { Duplex } from 'node:stream';
import { WebSocket, WebSocketServer, type RawData } from 'ws';
import type { TaskSubscriber } from '../orchestration/event-broadcaster.js';
import { TaskNotFoundError } from '../orchestration/task-registry.js';
import type { TrialSupervisor } from '../orchestration/trial-supervisor.js';
import type { TaskEvent } from '../orchestration/types.js';
import { describeError } from '../trial/errors.js';
import { createLogger, type Logger } from '../utils/logger.js';

export interface WebSocketAttachment {
  wss: WebSocketServer;
  close: () => Promise<void>;
}

export interface WebSocketOptions {
  logger?: Logger;
}

const taskIdFromPath = (pathname: string) => {
  const match = pathname.match(/^\/ws\/(?:tasks|mining)\/([^/]+)\/?$/);
  if (!match) return null;
  try {
    return decodeURIComponent(match[1]);
  } catch {
    return null;
  }
};

const rawToString = (data: RawData) => {
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  return Buffer.from(data).toString('utf8');
};

const isPing = (raw: string) => {
  const text = raw.trim();
  if (text === 'ping') return true;
  try {
    const parsed: unknown = JSON.parse(text);
    return typeof parsed === 'object' && parsed !== null && 'type' in parsed && parsed.type === 'ping';
  } catch {
    return false;
  }
};

const socketSubscriber = (socket: WebSocket): TaskSubscriber => ({
  send: (event: TaskEvent) =>
    new Promise<void>((resolve, reject) => {
      if (socket.readyState !== WebSocket.OPEN) {
        reject(new Error('socket_not_open'));
        return;
      }
      socket.send(JSON.stringify(event), (error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    }),
});

/**
 * Serves live task events on `/ws/tasks/:id` (and the `/ws/mining/:id` alias).
 * A client may send `ping` or `{"type":"ping"}` and receives a heartbeat.
 */
export function attachTaskWebSockets(
  server: HttpServer,
  supervisor: TrialSupervisor,
  options: WebSocketOptions = {},
): WebSocketAttachment {
  const logger = options.logger ?? createLogger('runtime.websocket');
  const wss = new WebSocketServer({ noServer: true });

  const onConnection = (socket: WebSocket, taskId: string) => {
    const subscriber = socketSubscriber(socket);
    let detach: (() => void) | null = null;

    socket.on('error', (error) => {
      logger.debug(`websocket error on task ${taskId}`, error);
      socket.close();
    });

    try {
      detach = supervisor.subscribe(taskId, subscriber);
    } catch (error) {
      const message = error instanceof TaskNotFoundError ? 'Task not found' : describeError(error);
      const event: TaskEvent = { type: 'error', taskId, data: { error: message }, timestamp: new Date().toISOString() };
      socket.send(JSON.stringify(event));
      socket.close(1008, 'task_not_found');
      return;
    }
    logger.debug(`subscriber attached to task ${taskId}`);

    socket.on('message', (data) => {
      if (isPing(rawToString(data))) {
        supervisor.heartbeat(taskId, subscriber);
      }
    });

    socket.on('close', () => {
      detach?.();
      detach = null;
      logger.debug(`subscriber detached from task ${taskId}`);
    });

  };

  server.on('upgrade', (req: IncomingMessage, socket: Duplex, head: Buffer) => {
    const url = new URL(req.url || '/', 'http://localhost');
    const taskId = taskIdFromPath(url.pathname);
    if (!taskId) {
      socket.write('HTTP/1.1 404 Not Found\r\n\r\n');
      socket.destroy();
      return;
    }

    wss.handleUpgrade(req, socket, head, (ws) => {
      wss.emit('connection', ws, req);
      onConnection(ws, taskId);
    });
  });

  function close(): Promise<void> {
    return new Promise<void>((resolve) => {
      for (const client of wss.clients) {
        client.terminate();
      }
      wss.close(() => resolve());
    });
  }

  return { wss, close };
}
