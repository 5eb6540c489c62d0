import { createServer } from 'http';
import { initDatabase, closeDatabase } from './db/database.js';
import { logSignal } from './db/queries.js';
import { saveSimulation, loadSimulation } from './db/snapshot-store.js';
import { OcclusionGrid } from './simulation/occlusion.js';
import { Simulation } from './simulation/simulation.js';
import { GameLoop } from './simulation/game-loop.js';
import { WsServer } from './network/ws-server.js';
import { handleHttpRequest } from './network/http-routes.js';
import { SIM_CONFIG, renderMessage } from '@hustle/shared';

const PORT = parseInt(process.env.PORT || '3460', 10);

async function main() {
  console.log(renderMessage(SIM_CONFIG.messages.serverBanner));
  console.log(`Starting on port ${PORT}...`);

  // 1. Initialize database
  initDatabase();

  // 2. Load occlusion map
  const grid = OcclusionGrid.loadFromFile();
  console.log(`[Map] Loaded occlusion grid: ${grid.data.width}x${grid.data.height} cells`);

  // 3. Create simulation and restore the last save
  const sim = new Simulation({ lineOfSight: grid });
  loadSimulation(sim);
  sim.signals.onAny((signal) => logSignal(signal, sim.clock.now()));

  // 4. Create HTTP server
  const httpServer = createServer((req, res) => {
    const handled = handleHttpRequest(req, res, sim);
    if (!handled) {
      res.writeHead(404, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify({ error: 'Not found' }));
    }
  });

  // 5. Create WebSocket server
  const wsServer = new WsServer(httpServer, sim);

  // 6. Start game loop
  const gameLoop = new GameLoop(sim, {
    onStatusTick: () => wsServer.broadcastStatus(),
    onSave: () => saveSimulation(sim),
  });
  gameLoop.start();

  // 7. Start listening
  httpServer.listen(PORT, () => {
    console.log(`[HTTP] Listening on http://localhost:${PORT}`);
    console.log(`[WS]   WebSocket at ws://localhost:${PORT}/ws`);
    console.log(`[API]  GET  /api/status — Server status`);
    console.log(`[API]  POST /api/activities — Start an activity`);
    console.log(`[API]  GET  /api/heat — Heat and investigations`);
    console.log('');
    console.log(`${SIM_CONFIG.name} is running.`);
  });

  // Graceful shutdown
  const shutdown = () => {
    console.log('\n[Server] Shutting down...');
    gameLoop.stop();
    saveSimulation(sim);
    wsServer.close();
    closeDatabase();
    httpServer.close(() => {
      console.log('[Server] Goodbye.');
      process.exit(0);
    });
    // Force exit after 5s
    setTimeout(() => process.exit(1), 5000).unref();
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
