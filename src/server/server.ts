import 'dotenv/config';
import express from 'express';
import { loadConfig } from '../core/config';
import { parseAsOfDateTime } from '../core/time';
import { writeRunArtifact } from '../journal/storage';
import { createRebalanceDeps } from '../execution/dependencies';
import { executeRebalance } from '../execution/rebalanceRunner';
import { registerRoutes } from './routes';

export const createApp = () => {
  const config = loadConfig();
  const deps = createRebalanceDeps(config);
  const app = express();
  registerRoutes(app, {
    secret: process.env.WEBHOOK_SECRET || undefined,
    trigger: async (options) => {
      const { runId } = parseAsOfDateTime();
      const summary = await executeRebalance(deps, { ...options, runId });
      writeRunArtifact(runId, 'summary.json', summary);
      return summary;
    }
  });
  return { app, config };
};

const startServer = (app: express.Express, port: number, bind: string, allowFallback = true) => {
  const server = app.listen(port, bind, () => {
    const address = server.address();
    const actualPort = typeof address === 'object' && address ? address.port : port;
    console.log(`Rebalance webhook listening at http://${bind}:${actualPort}`);
  });
  server.on('error', (err: NodeJS.ErrnoException) => {
    if (allowFallback && (err.code === 'EACCES' || err.code === 'EPERM' || err.code === 'EADDRINUSE')) {
      console.warn(`Port ${port} blocked (${err.code}); retrying on an ephemeral port.`);
      startServer(app, 0, bind, false);
      return;
    }
    console.error('Webhook server failed to start', err);
    process.exit(1);
  });
};

if (require.main === module) {
  const { app, config } = createApp();
  startServer(app, config.webhookPort, config.webhookBind);
}
