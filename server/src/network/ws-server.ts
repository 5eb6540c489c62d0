import { WebSocketServer, WebSocket } from 'ws';
import type { Server } from 'http';
import type { ClientMessage, ServerMessage, SimSignal, SimSignalType } from '@hustle/shared';
import type { Simulation } from '../simulation/simulation.js';

interface Subscriber {
  ws: WebSocket;
  /** null = every signal */
  filter: Set<SimSignalType> | null;
}

/**
 * Read-only push channel for UI layers: every delivered signal, plus a
 * status frame at the broadcast rate.
 */
export class WsServer {
  private wss: WebSocketServer;
  private subscribers = new Set<Subscriber>();
  private sim: Simulation;
  private unsubscribe: () => void;

  constructor(httpServer: Server, sim: Simulation) {
    this.sim = sim;
    this.wss = new WebSocketServer({ server: httpServer, path: '/ws' });

    this.wss.on('connection', (ws: WebSocket) => {
      this.handleConnection(ws);
    });

    this.unsubscribe = sim.signals.onAny((signal) => this.broadcastSignal(signal));

    console.log('[WS] WebSocket server ready on /ws');
  }

  get connectionCount(): number {
    return this.subscribers.size;
  }

  private handleConnection(ws: WebSocket): void {
    const subscriber: Subscriber = { ws, filter: null };
    this.subscribers.add(subscriber);

    this.send(ws, { type: 'welcome', status: this.sim.statusUpdate() });

    ws.on('message', (data) => {
      let msg: ClientMessage;
      try {
        msg = JSON.parse(data.toString()) as ClientMessage;
      } catch {
        this.sendError(ws, 'invalid_message', 'Invalid JSON');
        return;
      }
      if (typeof msg !== 'object' || msg === null) {
        this.sendError(ws, 'invalid_message', 'Expected a JSON object');
        return;
      }

      switch (msg.type) {
        case 'subscribe':
          if (!Array.isArray(msg.signals)) {
            this.sendError(ws, 'invalid_message', 'signals must be an array');
            return;
          }
          subscriber.filter = msg.signals.length > 0 ? new Set(msg.signals) : null;
          break;
        case 'status':
          this.send(ws, { type: 'status', data: this.sim.statusUpdate() });
          break;
        default:
          this.sendError(ws, 'unknown_message', 'Expected subscribe or status');
      }
    });

    ws.on('close', () => {
      this.subscribers.delete(subscriber);
    });

    ws.on('error', (err) => {
      console.warn(`[WS] Socket error: ${err.message}`);
      this.subscribers.delete(subscriber);
    });
  }

  broadcastStatus(): void {
    if (this.subscribers.size === 0) return;
    const msg: ServerMessage = { type: 'status', data: this.sim.statusUpdate() };
    for (const { ws } of this.subscribers) this.send(ws, msg);
  }

  private broadcastSignal(signal: SimSignal): void {
    if (this.subscribers.size === 0) return;
    const msg: ServerMessage = { type: 'signal', game_time: this.sim.clock.now(), signal };
    for (const { ws, filter } of this.subscribers) {
      if (filter && !filter.has(signal.type)) continue;
      this.send(ws, msg);
    }
  }

  close(): void {
    this.unsubscribe();
    for (const { ws } of this.subscribers) ws.close(1001, 'Server shutting down');
    this.subscribers.clear();
    this.wss.close();
  }

  private send(ws: WebSocket, msg: ServerMessage): void {
    if (ws.readyState === WebSocket.OPEN) {
      ws.send(JSON.stringify(msg));
    }
  }

  private sendError(ws: WebSocket, code: string, message: string): void {
    this.send(ws, { type: 'error', code, message });
  }
}
