import { describe, expect, test } from 'vitest';

import { HaMcpError } from '../../src/errors.js';
import {
  toWebSocketUrl,
  WsConnection,
  type SocketFactory,
  type SocketHandlers,
  type SocketLike
} from '../../src/homeassistant/wsConnection.js';
import { makeLogger } from '../helpers/fakes.js';

type Frame = Record<string, unknown>;
type Responder = (command: Frame, socket: FakeSocket) => Frame | undefined;

class FakeSocket implements SocketLike {
  readonly sent: Frame[] = [];
  closed = false;

  constructor(
    readonly handlers: SocketHandlers,
    private readonly respond: Responder,
    private readonly authReply: Frame
  ) {}

  send(data: string): void {
    const frame: Frame = JSON.parse(data);
    this.sent.push(frame);
    const reply = frame.type === 'auth' ? this.authReply : this.respond(frame, this);
    if (reply) {
      this.emit(reply);
    }
  }

  close(): void {
    this.closed = true;
  }

  emit(frame: Frame): void {
    queueMicrotask(() => this.handlers.onMessage(JSON.stringify(frame)));
  }
}

/** In-process stand-in for the Home Assistant WebSocket endpoint. */
function fakeServer(respond: Responder, authReply: Frame = { type: 'auth_ok', ha_version: '2026.10.0' }) {
  const sockets: FakeSocket[] = [];
  const factory: SocketFactory = (_url, handlers) => {
    const socket = new FakeSocket(handlers, respond, authReply);
    sockets.push(socket);
    queueMicrotask(() => {
      handlers.onOpen();
      handlers.onMessage(JSON.stringify({ type: 'auth_required', ha_version: '2026.10.0' }));
    });
    return socket;
  };
  return { factory, sockets };
}

function makeConnection(socketFactory: SocketFactory, timeoutMs = 1_000) {
  return new WsConnection({
    url: 'ws://127.0.0.1:8123/api/websocket',
    token: 'test-token',
    timeoutMs,
    logger: makeLogger(),
    socketFactory
  });
}

async function captureError(promise: Promise<unknown>): Promise<HaMcpError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof HaMcpError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected a rejection');
}

describe('WsConnection', () => {
  test('authenticates before sending commands and resolves results', async () => {
    const server = fakeServer((command) => ({
      id: command.id,
      type: 'result',
      success: true,
      result: [{ area_id: 'kitchen' }]
    }));
    const connection = makeConnection(server.factory);

    await expect(connection.sendCommand('config/area_registry/list')).resolves.toEqual([{ area_id: 'kitchen' }]);

    const [socket] = server.sockets;
    expect(socket?.sent).toEqual([
      { type: 'auth', access_token: 'test-token' },
      { id: 1, type: 'config/area_registry/list' }
    ]);
  });

  test('reuses the session and increments message ids', async () => {
    const server = fakeServer((command) => ({ id: command.id, type: 'result', success: true, result: null }));
    const connection = makeConnection(server.factory);

    await connection.sendCommand('schedule/list');
    await connection.sendCommand('input_boolean/list');

    expect(server.sockets).toHaveLength(1);
    expect(server.sockets[0]?.sent.map((frame) => frame.id)).toEqual([undefined, 1, 2]);
  });

  test('maps error replies to error codes', async () => {
    const server = fakeServer((command) => ({
      id: command.id,
      type: 'result',
      success: false,
      error: { code: 'not_found', message: 'Unable to find automation' }
    }));
    const connection = makeConnection(server.factory);

    const error = await captureError(connection.sendCommand('automation/config', { entity_id: 'automation.x' }));

    expect(error.code).toBe('NOT_FOUND');
    expect(error.message).toBe('automation/config failed: Unable to find automation');
    expect(connection.pendingCount).toBe(0);
  });

  test('answers ping with pong', async () => {
    const server = fakeServer((command) => ({ id: command.id, type: 'pong' }));
    const connection = makeConnection(server.factory);

    await expect(connection.ping()).resolves.toBeUndefined();
  });

  test('rejects invalid credentials', async () => {
    const server = fakeServer(() => undefined, { type: 'auth_invalid', message: 'Invalid password' });
    const connection = makeConnection(server.factory);

    const error = await captureError(connection.sendCommand('schedule/list'));

    expect(error.code).toBe('AUTH');
    expect(error.message).toBe('authentication failed: Invalid password');
    expect(server.sockets[0]?.closed).toBe(true);
  });

  test('fails pending commands when the socket drops and reconnects on the next one', async () => {
    let dropped = false;
    const server = fakeServer((command, socket) => {
      if (!dropped) {
        dropped = true;
        queueMicrotask(() => socket.handlers.onClose(1006, ''));
        return undefined;
      }
      return { id: command.id, type: 'result', success: true, result: 'ok' };
    });
    const connection = makeConnection(server.factory);

    const error = await captureError(connection.sendCommand('schedule/list'));
    expect(error.code).toBe('NETWORK');
    expect(error.message).toBe('schedule/list failed: WebSocket connection lost (code 1006)');
    expect(connection.pendingCount).toBe(0);

    await expect(connection.sendCommand('schedule/list')).resolves.toBe('ok');
    expect(server.sockets).toHaveLength(2);
  });

  test('times out commands without a reply', async () => {
    const server = fakeServer(() => undefined);
    const connection = makeConnection(server.factory, 20);

    const error = await captureError(connection.sendCommand('slow/command'));

    expect(error.code).toBe('TIMEOUT');
    expect(error.message).toBe('slow/command timed out after 20ms');
  });

  test('closing during authentication leaves the next session alone', async () => {
    const server = fakeServer((command) => ({ id: command.id, type: 'result', success: true, result: 'ok' }));
    const stalled: FakeSocket[] = [];
    const factory: SocketFactory = (url, handlers) => {
      if (stalled.length === 0) {
        const socket = new FakeSocket(handlers, () => undefined, { type: 'auth_ok' });
        stalled.push(socket);
        return socket;
      }
      return server.factory(url, handlers);
    };
    const connection = makeConnection(factory, 30);

    const first = captureError(connection.sendCommand('schedule/list'));
    connection.close();
    const error = await first;
    expect(error.code).toBe('NETWORK');
    expect(error.message).toBe('WebSocket connection closed');
    expect(stalled[0]?.closed).toBe(true);

    await expect(connection.sendCommand('schedule/list')).resolves.toBe('ok');
    await new Promise((resolve) => setTimeout(resolve, 60));

    expect(server.sockets[0]?.closed).toBe(false);
    await expect(connection.sendCommand('schedule/list')).resolves.toBe('ok');
    expect(server.sockets).toHaveLength(1);
  });

  test('retries the connection after the socket cannot be opened', async () => {
    const server = fakeServer((command) => ({ id: command.id, type: 'result', success: true, result: 'ok' }));
    let attempts = 0;
    const factory: SocketFactory = (url, handlers) => {
      attempts += 1;
      if (attempts === 1) {
        throw new Error('connect ECONNREFUSED');
      }
      return server.factory(url, handlers);
    };
    const connection = makeConnection(factory);

    const error = await captureError(connection.sendCommand('schedule/list'));
    expect(error.code).toBe('NETWORK');
    expect(error.message).toBe('WebSocket connect failed: connect ECONNREFUSED');

    await expect(connection.sendCommand('schedule/list')).resolves.toBe('ok');
  });

  test('rejects commands on an aborted signal', async () => {
    const server = fakeServer(() => undefined);
    const connection = makeConnection(server.factory);
    const controller = new AbortController();
    controller.abort();

    const error = await captureError(connection.sendCommand('schedule/list', {}, controller.signal));

    expect(error.message).toBe('schedule/list aborted');
    expect(server.sockets).toHaveLength(0);
  });
});

describe('toWebSocketUrl', () => {
  test('derives the websocket endpoint from the base URL', () => {
    expect(toWebSocketUrl('http://127.0.0.1:8123')).toBe('ws://127.0.0.1:8123/api/websocket');
    expect(toWebSocketUrl('https://ha.example.test/base/')).toBe('wss://ha.example.test/base/api/websocket');
  });
});
