import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createServer, type Server } from 'http';
import { WebSocket } from 'ws';
import type { ServerMessage } from '@hustle/shared';
import { WsServer } from '../src/network/ws-server.js';
import { Simulation } from '../src/simulation/simulation.js';

/** Buffers incoming frames so a test can await them in order */
class Inbox {
  private queue: ServerMessage[] = [];
  private waiting: Array<(msg: ServerMessage) => void> = [];

  constructor(ws: WebSocket) {
    ws.on('message', (data) => {
      const msg: ServerMessage = JSON.parse(data.toString());
      const waiter = this.waiting.shift();
      if (waiter) waiter(msg);
      else this.queue.push(msg);
    });
  }

  next(): Promise<ServerMessage> {
    const queued = this.queue.shift();
    if (queued) return Promise.resolve(queued);
    return new Promise((resolve) => this.waiting.push(resolve));
  }
}

let sim: Simulation;
let httpServer: Server;
let wsServer: WsServer;
let url: string;
const clients: WebSocket[] = [];

async function connect(): Promise<{ ws: WebSocket; inbox: Inbox }> {
  const ws = new WebSocket(url);
  clients.push(ws);
  const inbox = new Inbox(ws);
  await new Promise<void>((resolve, reject) => {
    ws.once('open', () => resolve());
    ws.once('error', reject);
  });
  return { ws, inbox };
}

beforeEach(async () => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
  sim = new Simulation();
  httpServer = createServer();
  wsServer = new WsServer(httpServer, sim);
  await new Promise<void>((resolve) => httpServer.listen(0, '127.0.0.1', resolve));
  const address = httpServer.address();
  if (address === null || typeof address === 'string') throw new Error('server has no TCP address');
  url = `ws://127.0.0.1:${address.port}/ws`;
});

afterEach(async () => {
  for (const ws of clients.splice(0)) ws.terminate();
  wsServer.close();
  await new Promise<void>((resolve) => httpServer.close(() => resolve()));
  vi.restoreAllMocks();
});

describe('WsServer', () => {
  it('greets a new connection with the current status', async () => {
    const { inbox } = await connect();
    const welcome = await inbox.next();
    expect(welcome).toEqual({ type: 'welcome', status: sim.statusUpdate() });
    expect(wsServer.connectionCount).toBe(1);
  });

  it('forwards only the subscribed signal types', async () => {
    const { ws, inbox } = await connect();
    await inbox.next();

    ws.send(JSON.stringify({ type: 'subscribe', signals: ['heat_increased'] }));
    ws.send(JSON.stringify({ type: 'status' }));
    expect(await inbox.next()).toMatchObject({ type: 'status' });

    sim.activities.create('screen', 'livestream', 60);
    sim.heat.addHeat(5, 'flashy_purchase');
    sim.signals.flush();

    expect(await inbox.next()).toEqual({
      type: 'signal',
      game_time: 0,
      signal: { type: 'heat_increased', actorId: 'player', amount: 5, cause: 'flashy_purchase', level: 5 },
    });
  });

  it('answers unknown messages with an error frame', async () => {
    const { ws, inbox } = await connect();
    await inbox.next();

    ws.send('not json');
    expect(await inbox.next()).toEqual({ type: 'error', code: 'invalid_message', message: 'Invalid JSON' });

    ws.send(JSON.stringify({ type: 'dance' }));
    expect(await inbox.next()).toEqual({ type: 'error', code: 'unknown_message', message: 'Expected subscribe or status' });
  });
});
