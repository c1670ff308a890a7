import 'dotenv/config';
import express from 'express';
import { registerRoutes } from './routes';

export const createApp = (startedAt = new Date().toISOString()) => {
  const app = express();
  app.disable('x-powered-by');
  registerRoutes(app, startedAt);
  return app;
};

const startServer = (port: number, bind: string) => {
  const app = createApp();
  const server = app.listen(port, bind, () => {
    const address = server.address();
    const boundPort = typeof address === 'object' && address !== null ? address.port : port;
    console.log(`[ops] listening on http://${bind}:${boundPort}`);
  });
  server.on('error', (err: NodeJS.ErrnoException) => {
    console.error(`[ops] failed to start: ${err.code ?? err.message}`);
    process.exitCode = 1;
  });
};

if (require.main === module) {
  startServer(Number(process.env.OPS_PORT || 8788), process.env.OPS_BIND || '127.0.0.1');
}
