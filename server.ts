import 'dotenv/config';
import { createServer } from 'node:http';
import { WebSocketServer } from 'ws';
import { loadSettings } from './server/config.js';
import { formatSnapshot } from './server/format.js';
import { createControlApp } from './server/http_api.js';
import type { FinalReport, ProgressSnapshot } from './server/run_state.js';
import { ProbeRuntime } from './server/runtime.js';

async function startServer(): Promise<void> {
  const settings = loadSettings();
  const runtime = new ProbeRuntime({ settings });
  const app = createControlApp(runtime);
  const httpServer = createServer(app);
  const wss = new WebSocketServer({ server: httpServer });

  function broadcast(payload: unknown): void {
    const message = JSON.stringify(payload);
    for (const client of wss.clients) {
      if (client.readyState === 1) {
        client.send(message);
      }
    }
  }

  runtime.on('progress', (snapshot: ProgressSnapshot) => {
    console.log(`[server] ${formatSnapshot(snapshot)}`);
    broadcast({ type: 'progress', snapshot });
  });

  runtime.on('report', (report: FinalReport) => {
    broadcast({ type: 'report', report });
  });

  wss.on('connection', (ws) => {
    ws.send(JSON.stringify({ type: 'runs', runs: runtime.listRuns() }));
  });

  const shutdown = (signal: string): void => {
    console.log(`[server] ${signal} received, stopping active runs`);
    runtime.stopAll();
    wss.close();
    httpServer.close();
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  await new Promise<void>((resolve, reject) => {
    httpServer.once('error', reject);
    httpServer.listen(settings.port, settings.host, () => {
      console.log(`[server] control API on http://${settings.host}:${settings.port}`);
      resolve();
    });
  });
}

startServer().catch((error) => {
  console.error('[SERVER FATAL]', error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
