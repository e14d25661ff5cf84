/**
 * Spectator Server - WebSocket feed of a running colony game.
 *
 * Plays the colony turn by turn and broadcasts a snapshot after each turn.
 * Spectators can only watch: no client message changes the game.
 */

import { WebSocketServer, WebSocket } from 'ws';
import { createServer, IncomingMessage, ServerResponse } from 'http';
import type { AntColony } from '../engine/colony';
import { snapshotColony, type ColonySnapshot } from '../engine/snapshot';
import type { SimulationResult, SimulationStatus } from '../engine/types';

/**
 * Protocol version for API evolution.
 * Increment when making breaking changes to message format.
 */
export const PROTOCOL_VERSION = 1;
export const MIN_SUPPORTED_VERSION = 1;

interface VersionedMessage {
  v?: number;
}

/**
 * Message types sent to clients.
 */
export type ServerMessage = VersionedMessage & (
  | { type: 'PROTOCOL_INFO'; version: number; minSupported: number }
  | { type: 'COLONY_SNAPSHOT'; gameId: string; snapshot: ColonySnapshot }
  | { type: 'GAME_ENDED'; gameId: string; status: Exclude<SimulationStatus, 'RUNNING'>; time: number; food: number }
  | { type: 'ERROR'; message: string }
);

/**
 * Message types received from clients.
 */
export type ClientMessage = VersionedMessage & (
  | { type: 'GET_SNAPSHOT' }
  | { type: 'GET_PROTOCOL_INFO' }
);

/**
 * The part of a WebSocket the server writes to.
 */
export interface SpectatorClient {
  readonly readyState: number;
  send(data: string): void;
  close(code?: number, reason?: string): void;
}

/**
 * Parses a raw client message. Returns null for malformed or unknown ones.
 */
export function parseClientMessage(raw: string): ClientMessage | null {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return null;
  }
  if (typeof value !== 'object' || value === null || !('type' in value)) {
    return null;
  }
  const v = 'v' in value && typeof value.v === 'number' ? value.v : undefined;
  switch (value.type) {
    case 'GET_SNAPSHOT':
      return { v, type: 'GET_SNAPSHOT' };
    case 'GET_PROTOCOL_INFO':
      return { v, type: 'GET_PROTOCOL_INFO' };
    default:
      return null;
  }
}

export function encodeMessage(message: ServerMessage): string {
  return JSON.stringify({ v: PROTOCOL_VERSION, ...message });
}

/**
 * Spectator server configuration.
 */
export interface SpectatorServerConfig {
  gameId: string;
  /** Pause between turns so spectators can follow */
  turnDelayMs: number;
  /** Close every connection and stop listening once the game ends */
  stopWhenDone: boolean;
}

export const DEFAULT_SPECTATOR_CONFIG: SpectatorServerConfig = {
  gameId: 'colony',
  turnDelayMs: 1000,
  stopWhenDone: true,
};

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export class SpectatorServer {
  private wss: WebSocketServer | null = null;
  private httpServer: ReturnType<typeof createServer> | null = null;
  private clients: Set<SpectatorClient> = new Set();
  private readonly colony: AntColony;
  private readonly config: SpectatorServerConfig;

  constructor(colony: AntColony, config: Partial<SpectatorServerConfig> = {}) {
    this.colony = colony;
    this.config = { ...DEFAULT_SPECTATOR_CONFIG, ...config };
  }

  /**
   * Health check body.
   */
  health(): { status: 'ok'; gameId: string; colony: SimulationStatus; time: number; clients: number } {
    return {
      status: 'ok',
      gameId: this.config.gameId,
      colony: this.colony.status,
      time: this.colony.time,
      clients: this.clients.size,
    };
  }

  private handleHttpRequest(req: IncomingMessage, res: ServerResponse): void {
    const url = req.url ?? '';

    if (url === '/health' || url === '/') {
      res.writeHead(200, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify(this.health()));
      return;
    }

    res.writeHead(404);
    res.end('Not found');
  }

  snapshotMessage(): ServerMessage {
    return { type: 'COLONY_SNAPSHOT', gameId: this.config.gameId, snapshot: snapshotColony(this.colony) };
  }

  /**
   * Builds the replies to a raw client message.
   */
  handleClientMessage(raw: string): ServerMessage[] {
    const message = parseClientMessage(raw);
    if (!message) {
      return [{ type: 'ERROR', message: 'Invalid message format' }];
    }
    switch (message.type) {
      case 'GET_SNAPSHOT':
        return [this.snapshotMessage()];
      case 'GET_PROTOCOL_INFO':
        return [{ type: 'PROTOCOL_INFO', version: PROTOCOL_VERSION, minSupported: MIN_SUPPORTED_VERSION }];
    }
  }

  /**
   * Registers a spectator and greets it with the protocol and current state.
   */
  connect(client: SpectatorClient): void {
    this.clients.add(client);
    this.sendToClient(client, { type: 'PROTOCOL_INFO', version: PROTOCOL_VERSION, minSupported: MIN_SUPPORTED_VERSION });
    this.sendToClient(client, this.snapshotMessage());
  }

  receive(client: SpectatorClient, raw: string): void {
    for (const reply of this.handleClientMessage(raw)) {
      this.sendToClient(client, reply);
    }
  }

  disconnect(client: SpectatorClient): void {
    this.clients.delete(client);
  }

  /**
   * Starts the WebSocket server with HTTP health endpoint.
   */
  start(port: number): Promise<void> {
    const httpServer = createServer((req, res) => this.handleHttpRequest(req, res));
    const wss = new WebSocketServer({ server: httpServer });
    this.httpServer = httpServer;
    this.wss = wss;

    wss.on('connection', (ws) => {
      this.connect(ws);
      console.log(`Spectator connected. Total: ${this.clients.size}`);

      ws.on('message', (data) => this.receive(ws, data.toString()));
      ws.on('close', () => {
        this.disconnect(ws);
        console.log(`Spectator disconnected. Total: ${this.clients.size}`);
      });
    });

    return new Promise((resolve) => {
      httpServer.listen(port, () => {
        console.log(`Spectator server listening on port ${port}`);
        console.log(`Health check: http://localhost:${port}/health`);
        resolve();
      });
    });
  }

  /**
   * Plays the colony to the end, broadcasting after every turn. Stops the
   * server afterwards unless stopWhenDone is off.
   */
  async run(): Promise<SimulationResult> {
    for (;;) {
      const result = await this.colony.step();
      this.broadcast(this.snapshotMessage());
      if (result.status !== 'RUNNING') {
        this.broadcast({
          type: 'GAME_ENDED',
          gameId: this.config.gameId,
          status: result.status,
          time: result.time,
          food: result.food,
        });
        if (this.config.stopWhenDone) {
          this.stop();
        }
        return result;
      }
      if (this.config.turnDelayMs > 0) {
        await sleep(this.config.turnDelayMs);
      }
    }
  }

  stop(): void {
    for (const client of this.clients) {
      client.close(1000, 'Game over');
    }
    this.clients.clear();
    if (this.wss) {
      this.wss.close();
      this.wss = null;
    }
    if (this.httpServer) {
      this.httpServer.close();
      this.httpServer = null;
    }
  }

  private sendToClient(client: SpectatorClient, message: ServerMessage): void {
    if (client.readyState === WebSocket.OPEN) {
      client.send(encodeMessage(message));
    }
  }

  private broadcast(message: ServerMessage): void {
    const data = encodeMessage(message);
    for (const client of this.clients) {
      if (client.readyState === WebSocket.OPEN) {
        client.send(data);
      }
    }
  }

  getClientCount(): number {
    return this.clients.size;
  }
}
