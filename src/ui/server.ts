import 'dotenv/config';
import crypto from 'crypto';
import express from 'express';
import { createLogger } from '../core/logger';
import { loadDesk } from '../desk';
import { DeskApi } from './api';
import { registerRoutes } from './routes';

const log = createLogger('ui');

const desk = loadDesk();
const app = express();
const csrfToken = crypto.randomUUID();
const desiredPort = Number(process.env.UI_PORT || desk.config.ui.port);
const desiredBind = process.env.UI_BIND || desk.config.ui.bind;

registerRoutes(app, new DeskApi(desk), csrfToken);

const startServer = (port: number, bind: string, allowFallback = true) => {
  const server = app.listen(port, bind, () => {
    const address = server.address();
    const boundPort = address && typeof address === 'object' ? address.port : port;
    log.info(`API listening on http://${bind}:${boundPort}`);
  });
  server.on('error', (err: NodeJS.ErrnoException) => {
    if (allowFallback && (err.code === 'EACCES' || err.code === 'EPERM' || err.code === 'EADDRINUSE')) {
      log.warn(`Port ${port} unavailable (${err.code}); retrying on an ephemeral port`);
      startServer(0, bind, false);
      return;
    }
    log.error('API failed to start', { error: err.message });
    process.exitCode = 1;
  });
};

startServer(desiredPort, desiredBind);
