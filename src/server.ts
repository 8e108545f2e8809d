/**
 * Node entry point: serves the fetch-style app over node:http.
 *
 * Run with:
 *   npm start
 */

import { createServer } from 'node:http';
import { createApp, type App } from './index.js';
import { BodyTooLargeError, toRequest, writeResponse } from './http/node-adapter.js';
import { loadConfig } from './config.js';
import { createSeededRng, mathRandomRng } from './domain/rng.js';
import { FileStateStore, MemoryStateStore, type StateStore } from './infra/stateStore.js';
import { createLogger, type Logger } from './infra/logger.js';

function serve(app: App, port: number, log: Logger): void {
  const server = createServer((req, res) => {
    toRequest(req, port)
      .then((request) => app.fetch(request))
      .then((response) => writeResponse(response, res))
      .catch((error: unknown) => {
        if (error instanceof BodyTooLargeError) {
          log.warn('server', error.message);
          res.writeHead(413, { 'Content-Type': 'application/json', Connection: 'close' });
          res.end(JSON.stringify({ error: error.code, message: error.message }));
          return;
        }
        log.error('server', 'Request failed', error);
        if (!res.headersSent) {
          res.writeHead(500, { 'Content-Type': 'application/json' });
        }
        res.end(JSON.stringify({ error: 'internal_error', message: 'Internal error' }));
      });
  });

  server.listen(port, () => {
    log.info('server', `Listening on http://localhost:${port}`);
  });
}

function main(): void {
  const config = loadConfig();
  const log = createLogger(config.LOG_LEVEL);

  const store: StateStore = config.DATA_FILE
    ? new FileStateStore(config.DATA_FILE, log)
    : new MemoryStateStore();
  if (!config.DATA_FILE) {
    log.warn('server', 'DATA_FILE not set; state is kept in memory only');
  }

  const app = createApp({
    store,
    rng: config.RNG_SEED === undefined ? mathRandomRng : createSeededRng(config.RNG_SEED),
    logger: log,
    initialSettings: {
      dayStartHour: config.DAY_START_HOUR,
      utcOffsetMinutes: config.UTC_OFFSET_MINUTES,
    },
  });

  serve(app, config.PORT, log);
}

main();
