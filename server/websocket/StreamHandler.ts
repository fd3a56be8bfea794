/**
 * StreamHandler - Handles websocket connections and message routing
 *
 * - Manages client subscriptions (client -> Set<loopId>)
 * - Forwards packets, rate reports and loop state of subscribed loops
 * - Cleans up on client disconnect
 */

import type { WebSocket, WebSocketServer } from 'ws';
import type { LoopManager } from '../sessions/LoopManager.js';
import type { ClientMessage, ServerMessage } from '../../shared/types.js';

export interface StreamHandler {
  getClientCount(): number;
  close(): void;
}

interface ClientState {
  id: string;
  ws: WebSocket;
  subscriptions: Set<string>; // Set of loopIds
}

let clientIdCounter = 0;

function generateClientId(): string {
  return `client-${++clientIdCounter}-${Date.now()}`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

// Narrow parsed JSON to a ClientMessage, or describe what is wrong with it
function parseClientMessage(value: unknown): ClientMessage | string {
  const type = isRecord(value) ? value.type : undefined;
  if (!isRecord(value) || typeof type !== 'string') {
    return 'Message must be an object with a string "type"';
  }
  const loopId = value.loopId;

  switch (type) {
    case 'getLoops':
      return { type };

    case 'subscribe':
    case 'unsubscribe':
      if (typeof loopId !== 'string') return `${type} requires a string "loopId"`;
      return { type, loopId };

    case 'setTimebase': {
      const secondsPerDivision = value.secondsPerDivision;
      if (typeof loopId !== 'string') return 'setTimebase requires a string "loopId"';
      if (typeof secondsPerDivision !== 'number') return 'setTimebase requires a numeric "secondsPerDivision"';
      return { type, loopId, secondsPerDivision };
    }

    default:
      return `Unknown message type: ${type}`;
  }
}

export function createStreamHandler(
  wss: WebSocketServer,
  loopManager: LoopManager
): StreamHandler {
  const clients = new Map<WebSocket, ClientState>();

  // Send a message to a specific client
  function send(ws: WebSocket, message: ServerMessage): void {
    if (ws.readyState === 1) { // OPEN
      ws.send(JSON.stringify(message));
    }
  }

  // Handle incoming messages
  function handleMessage(clientState: ClientState, data: string): void {
    let parsed: unknown;

    try {
      parsed = JSON.parse(data);
    } catch {
      send(clientState.ws, {
        type: 'error',
        code: 'INVALID_MESSAGE',
        message: 'Failed to parse JSON message',
      });
      return;
    }

    const message = parseClientMessage(parsed);
    if (typeof message === 'string') {
      send(clientState.ws, {
        type: 'error',
        code: message.startsWith('Unknown message type') ? 'UNKNOWN_MESSAGE_TYPE' : 'INVALID_MESSAGE',
        message,
      });
      return;
    }

    switch (message.type) {
      case 'getLoops':
        handleGetLoops(clientState);
        break;

      case 'subscribe':
        handleSubscribe(clientState, message.loopId);
        break;

      case 'unsubscribe':
        handleUnsubscribe(clientState, message.loopId);
        break;

      case 'setTimebase':
        handleSetTimebase(clientState, message.loopId, message.secondsPerDivision).catch((err: unknown) => {
          console.error('[StreamHandler] setTimebase failed:', err);
        });
        break;
    }
  }

  function handleGetLoops(clientState: ClientState): void {
    send(clientState.ws, { type: 'loops', loops: loopManager.getLoopSummaries() });
  }

  function handleSubscribe(clientState: ClientState, loopId: string): void {
    if (!loopManager.hasLoop(loopId)) {
      send(clientState.ws, {
        type: 'error',
        loopId,
        code: 'LOOP_NOT_FOUND',
        message: `Loop not found: ${loopId}`,
      });
      return;
    }

    // Forward everything the loop broadcasts
    const callback = (message: ServerMessage) => {
      send(clientState.ws, message);
    };

    if (loopManager.subscribe(loopId, clientState.id, callback)) {
      clientState.subscriptions.add(loopId);
      send(clientState.ws, { type: 'subscribed', loopId });
    } else {
      send(clientState.ws, {
        type: 'error',
        loopId,
        code: 'SUBSCRIBE_FAILED',
        message: `Failed to subscribe to loop: ${loopId}`,
      });
    }
  }

  function handleUnsubscribe(clientState: ClientState, loopId: string): void {
    loopManager.unsubscribe(loopId, clientState.id);
    clientState.subscriptions.delete(loopId);
    send(clientState.ws, { type: 'unsubscribed', loopId });
  }

  async function handleSetTimebase(clientState: ClientState, loopId: string, secondsPerDivision: number): Promise<void> {
    const result = await loopManager.setTimebase(loopId, secondsPerDivision);
    if (!result.ok) {
      send(clientState.ws, {
        type: 'error',
        loopId,
        code: 'SET_TIMEBASE_FAILED',
        message: result.error.message,
      });
      return;
    }
    // Subscribers already got timebaseChanged from the manager
    if (!clientState.subscriptions.has(loopId)) {
      send(clientState.ws, { type: 'timebaseChanged', loopId, secondsPerDivision });
    }
  }

  // Handle client disconnect
  function handleDisconnect(ws: WebSocket): void {
    const clientState = clients.get(ws);
    if (clientState) {
      loopManager.unsubscribeAll(clientState.id);
      clients.delete(ws);
      console.log(`[StreamHandler] Client disconnected: ${clientState.id}`);
    }
  }

  wss.on('connection', (ws: WebSocket) => {
    const clientState: ClientState = {
      id: generateClientId(),
      ws,
      subscriptions: new Set(),
    };
    clients.set(ws, clientState);
    console.log(`[StreamHandler] Client connected: ${clientState.id}`);

    ws.on('message', (data: Buffer | string) => {
      handleMessage(clientState, data.toString());
    });

    ws.on('close', () => {
      handleDisconnect(ws);
    });

    ws.on('error', (err) => {
      console.error('[StreamHandler] WebSocket error:', err);
      handleDisconnect(ws);
    });
  });

  function getClientCount(): number {
    return clients.size;
  }

  function close(): void {
    for (const [ws, clientState] of clients) {
      loopManager.unsubscribeAll(clientState.id);
      clients.delete(ws);
    }
  }

  return {
    getClientCount,
    close,
  };
}
