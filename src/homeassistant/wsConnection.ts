import type { Logger } from 'pino';
import WebSocket, { type RawData } from 'ws';

import { errorMessage, HaMcpError, type ErrorCode } from '../errors.js';
import { isRecord, toStringValue } from './normalizer.js';

export interface SocketHandlers {
  onOpen(): void;
  onMessage(text: string): void;
  onClose(code: number, reason: string): void;
  onError(error: Error): void;
}

export interface SocketLike {
  send(data: string): void;
  close(): void;
}

export type SocketFactory = (url: string, handlers: SocketHandlers) => SocketLike;

export interface WsConnectionOptions {
  url: string;
  token: string;
  timeoutMs: number;
  logger: Logger;
  socketFactory?: SocketFactory;
}

interface PendingCommand {
  type: string;
  resolve(value: unknown): void;
  reject(error: HaMcpError): void;
}

function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString('utf8');
  }
  return data.toString('utf8');
}

export const createWsSocket: SocketFactory = (url, handlers) => {
  const socket = new WebSocket(url);
  socket.on('open', () => handlers.onOpen());
  socket.on('message', (data) => handlers.onMessage(rawDataToString(data)));
  socket.on('close', (code, reason) => handlers.onClose(code, reason.toString('utf8')));
  socket.on('error', (error) => handlers.onError(error));
  return socket;
};

export function toWebSocketUrl(baseUrl: string): string {
  const url = new URL(baseUrl);
  url.protocol = url.protocol === 'https:' ? 'wss:' : 'ws:';
  url.pathname = `${url.pathname.replace(/\/+$/, '')}/api/websocket`;
  url.search = '';
  url.hash = '';
  return url.toString();
}

function wsErrorCode(code: string): ErrorCode {
  switch (code) {
    case 'not_found':
      return 'NOT_FOUND';
    case 'invalid_format':
    case 'not_supported':
    case 'unknown_command':
      return 'BAD_REQUEST';
    case 'unauthorized':
      return 'AUTH';
    case 'timeout':
      return 'TIMEOUT';
    default:
      return 'HA_ERROR';
  }
}

/**
 * Single authenticated WebSocket session. Connects lazily on the first
 * command, correlates replies by message id and reconnects on the next command
 * after the socket drops.
 */
export class WsConnection {
  private readonly socketFactory: SocketFactory;
  private socket: SocketLike | null = null;
  private ready: Promise<void> | null = null;
  private settleAuth: ((error?: HaMcpError) => void) | null = null;
  private nextId = 1;
  private readonly pending = new Map<number, PendingCommand>();

  constructor(private readonly options: WsConnectionOptions) {
    this.socketFactory = options.socketFactory ?? createWsSocket;
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  async sendCommand(type: string, params: Record<string, unknown> = {}, signal?: AbortSignal): Promise<unknown> {
    if (signal?.aborted) {
      throw new HaMcpError('TIMEOUT', `${type} aborted`, { cause: signal.reason });
    }

    await this.connect();
    const socket = this.socket;
    if (!socket) {
      throw new HaMcpError('NETWORK', `${type} failed: WebSocket is not connected`);
    }

    const id = this.nextId;
    this.nextId += 1;

    return new Promise<unknown>((resolve, reject) => {
      const cleanup = () => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        this.pending.delete(id);
      };
      const onAbort = () => {
        cleanup();
        reject(new HaMcpError('TIMEOUT', `${type} aborted`, { cause: signal?.reason }));
      };
      const timer = setTimeout(() => {
        cleanup();
        reject(new HaMcpError('TIMEOUT', `${type} timed out after ${this.options.timeoutMs}ms`));
      }, this.options.timeoutMs);

      signal?.addEventListener('abort', onAbort, { once: true });
      this.pending.set(id, {
        type,
        resolve: (value) => {
          cleanup();
          resolve(value);
        },
        reject: (error) => {
          cleanup();
          reject(error);
        }
      });

      this.options.logger.debug({ id, type }, 'Home Assistant WebSocket command');
      try {
        socket.send(JSON.stringify({ ...params, id, type }));
      } catch (error) {
        cleanup();
        reject(new HaMcpError('NETWORK', `${type} failed: could not send command`, { cause: error }));
      }
    });
  }

  async ping(signal?: AbortSignal): Promise<void> {
    await this.sendCommand('ping', {}, signal);
  }

  close(): void {
    const socket = this.socket;
    this.detach(new HaMcpError('NETWORK', 'WebSocket connection closed'));
    socket?.close();
  }

  private connect(): Promise<void> {
    if (this.ready) {
      return this.ready;
    }

    const ready = new Promise<void>((resolve, reject) => {
      let settled = false;
      let attemptSocket: SocketLike | null = null;
      const timer = setTimeout(() => {
        settle(new HaMcpError('TIMEOUT', `WebSocket authentication timed out after ${this.options.timeoutMs}ms`));
      }, this.options.timeoutMs);

      // Settles this attempt only; a later attempt's socket is never touched.
      const settle = (error?: HaMcpError) => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        if (this.settleAuth === settle) {
          this.settleAuth = null;
        }
        if (error) {
          if (attemptSocket && this.socket === attemptSocket) {
            this.socket = null;
            this.ready = null;
          }
          attemptSocket?.close();
          reject(error);
          return;
        }
        resolve();
      };
      this.settleAuth = settle;

      let socket: SocketLike;
      try {
        socket = this.socketFactory(this.options.url, {
          onOpen: () => {
            this.options.logger.debug({ url: this.options.url }, 'Home Assistant WebSocket opened');
          },
          onMessage: (text) => {
            if (this.socket === socket) {
              this.handleMessage(socket, text);
            }
          },
          onClose: (code, reason) => {
            if (this.socket !== socket) {
              return;
            }
            this.options.logger.warn({ code, reason }, 'Home Assistant WebSocket closed');
            settle(new HaMcpError('NETWORK', `WebSocket closed before authentication (code ${code})`));
            this.detach(new HaMcpError('NETWORK', `WebSocket connection lost (code ${code})`));
          },
          onError: (error) => {
            this.options.logger.warn({ error: error.message }, 'Home Assistant WebSocket error');
            settle(new HaMcpError('NETWORK', `WebSocket error: ${error.message}`, { cause: error }));
          }
        });
      } catch (error) {
        settle(new HaMcpError('NETWORK', `WebSocket connect failed: ${errorMessage(error)}`, { cause: error }));
        return;
      }
      attemptSocket = socket;
      this.socket = socket;
    });

    this.ready = ready;
    ready.catch(() => {
      if (this.ready === ready) {
        this.ready = null;
      }
    });
    return ready;
  }

  private detach(error: HaMcpError): void {
    const settleAuth = this.settleAuth;
    this.socket = null;
    this.ready = null;
    settleAuth?.(error);
    for (const command of [...this.pending.values()]) {
      command.reject(new HaMcpError(error.code, `${command.type} failed: ${error.message}`, { cause: error }));
    }
  }

  private handleMessage(socket: SocketLike, text: string): void {
    let payload: unknown;
    try {
      payload = JSON.parse(text);
    } catch (error) {
      this.options.logger.warn({ error: String(error) }, 'Ignoring malformed Home Assistant WebSocket frame');
      return;
    }

    const messages = Array.isArray(payload) ? payload : [payload];
    for (const message of messages) {
      if (isRecord(message)) {
        this.dispatch(socket, message);
      }
    }
  }

  private dispatch(socket: SocketLike, message: Record<string, unknown>): void {
    switch (message.type) {
      case 'auth_required':
        socket.send(JSON.stringify({ type: 'auth', access_token: this.options.token }));
        return;
      case 'auth_ok':
        this.options.logger.info({ haVersion: toStringValue(message.ha_version) }, 'Home Assistant WebSocket authenticated');
        this.settleAuth?.();
        return;
      case 'auth_invalid':
        this.settleAuth?.(
          new HaMcpError('AUTH', `authentication failed: ${toStringValue(message.message) || 'invalid access token'}`)
        );
        return;
      case 'result':
      case 'pong':
        this.resolvePending(message);
        return;
      default:
        return;
    }
  }

  private resolvePending(message: Record<string, unknown>): void {
    const id = typeof message.id === 'number' ? message.id : Number.NaN;
    const command = this.pending.get(id);
    if (!command) {
      this.options.logger.debug({ id: message.id }, 'Ignoring reply for unknown WebSocket command');
      return;
    }

    if (message.type === 'pong' || message.success === true) {
      command.resolve(message.result ?? null);
      return;
    }

    const error = isRecord(message.error) ? message.error : {};
    const code = toStringValue(error.code) || 'unknown_error';
    const text = toStringValue(error.message) || 'unknown error';
    command.reject(new HaMcpError(wsErrorCode(code), `${command.type} failed: ${text}`, { details: { code } }));
  }
}
