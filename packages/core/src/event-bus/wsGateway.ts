/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import http from 'node:http';
import { WebSocketServer, WebSocket } from 'ws';
import type { AgentEventBus } from './bus.js';
import { AGENT_EVENT_TYPES, type AgentEvent } from './types.js';
import { silentPhaseLogger, type PhaseLogger } from '../utils/phaseLogger.js';

export interface EventBusGateway {
  readonly wss: WebSocketServer;
  /** Resolves with the bound port once the server is listening. */
  ready(): Promise<number>;
  close(): Promise<void>;
}

/**
 * Starts a WebSocket gateway that broadcasts all AgentEventBus events
 * to connected clients as line-delimited JSON.
 */
export function startEventBusGateway(
  bus: AgentEventBus,
  port: number = 0,
  log: PhaseLogger = silentPhaseLogger,
): EventBusGateway {
  const server = http.createServer();
  const wss = new WebSocketServer({ server });

  // Active clients and their unsubscribe functions
  const clients = new Map<WebSocket, Array<() => void>>();

  const dropClient = (ws: WebSocket) => {
    const unsubscribes = clients.get(ws);
    if (unsubscribes) {
      unsubscribes.forEach((unsubscribe) => unsubscribe());
      clients.delete(ws);
    }
  };

  wss.on('connection', (ws: WebSocket) => {
    log('GATEWAY', 'WebSocket client connected');

    const send = (event: AgentEvent) => {
      if (ws.readyState !== WebSocket.OPEN) return;
      ws.send(JSON.stringify(event) + '\n', (error) => {
        if (error) {
          log('GATEWAY', `Error sending event to client: ${error.message}`);
        }
      });
    };

    clients.set(
      ws,
      AGENT_EVENT_TYPES.map((eventType) => bus.subscribe(eventType, send)),
    );

    ws.on('close', () => {
      log('GATEWAY', 'WebSocket client disconnected');
      dropClient(ws);
    });

    ws.on('error', (error) => {
      log('GATEWAY', `WebSocket client error: ${error.message}`);
      dropClient(ws);
    });
  });

  wss.on('close', () => {
    for (const ws of [...clients.keys()]) {
      dropClient(ws);
    }
  });

  const listening = new Promise<number>((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, () => {
      const address = server.address();
      const boundPort = typeof address === 'object' && address ? address.port : port;
      log('GATEWAY', `Event bus WebSocket gateway listening on port ${boundPort}`);
      resolve(boundPort);
    });
  });

  return {
    wss,
    ready: () => listening,
    close: () =>
      new Promise<void>((resolve, reject) => {
        for (const client of wss.clients) {
          client.terminate();
        }
        wss.close(() => {
          server.close((error) => (error ? reject(error) : resolve()));
        });
      }),
  };
}
