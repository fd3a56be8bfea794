/**
 * Acquisition Server
 * Runs the configured acquisition loops and streams their packets over WebSocket
 */

import { createServer } from 'http';
import express from 'express';
import cors from 'cors';
import { WebSocketServer } from 'ws';
import { loadConfig } from './config.js';
import { createScheduler } from './acquisition/scheduler.js';
import { createLoopManager } from './sessions/LoopManager.js';
import { registerLoops } from './sessions/registerLoops.js';
import { createStreamHandler } from './websocket/StreamHandler.js';

const loaded = loadConfig(process.env);
if (!loaded.ok) {
  console.error(`Invalid configuration: ${loaded.error.message}`);
  process.exit(1);
}
const config = loaded.value;

const scheduler = createScheduler(config.scheduler);
const loopManager = createLoopManager();
registerLoops(loopManager, config, { scheduler });

// Create Express app
const app = express();
app.use(cors());
app.use(express.json());

// Health check
app.get('/api/health', (_req, res) => {
  res.json({
    status: 'ok',
    loops: loopManager.getLoopCount(),
    wsClients: streamHandler.getClientCount(),
  });
});

app.get('/api/loops', (_req, res) => {
  res.json(loopManager.getLoopSummaries());
});

// Create HTTP server (needed for WebSocket)
const server = createServer(app);

// Create WebSocket server
const wss = new WebSocketServer({ server, path: '/ws' });
const streamHandler = createStreamHandler(wss, loopManager);

function start(): void {
  console.log('Acquisition Server starting...');
  console.log(`  Source: ${config.source}${config.simulate ? ' (simulated)' : ''}`);
  console.log(`  Queue capacity: ${config.maxQueueSize === 0 ? 'unbounded' : config.maxQueueSize}`);
  console.log(`  Scheduler: ${config.scheduler}`);
  console.log(`  Pacing factor: ${config.pacingFactor}`);
  console.log('');

  loopManager.startAll();
  console.log(`Started ${loopManager.getLoopCount()} loop(s)`);

  server.listen(config.port, () => {
    console.log('');
    console.log(`Server running on http://localhost:${config.port}`);
    console.log('WebSocket endpoint: ws://localhost:' + config.port + '/ws');
    console.log('');
    console.log('REST API endpoints:');
    console.log('  GET  /api/health - Server status');
    console.log('  GET  /api/loops  - Loop summaries');
  });
}

// Graceful shutdown
let shuttingDown = false;

function shutdown(): void {
  if (shuttingDown) return;
  shuttingDown = true;
  console.log('Shutting down...');
  streamHandler.close();
  loopManager.stopAll()
    .catch((err: unknown) => {
      console.error('Failed to stop loops:', err);
    })
    .finally(() => {
      server.close(() => {
        console.log('Server closed');
        process.exit(0);
      });
    });
}

process.on('SIGTERM', shutdown);
process.on('SIGINT', shutdown);

start();
