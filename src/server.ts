import { createApp } from './app.js';
import { getRuntimeConfig } from './config/runtimeConfig.js';
import { TailEngine } from './engine/engine.js';
import { errMessage } from './http/errors.js';
import { log } from './log.js';
import { getVersionInfo } from './version.js';

const SHUTDOWN_TIMEOUT_MS = 10_000;

async function main(): Promise<void> {
  const config = getRuntimeConfig();
  const engine = TailEngine.fromConfig(config);
  await engine.start();

  const app = createApp(engine, { heartbeatMs: config.engine.hub.heartbeatMs });
  const { host, port } = config.server;

  const server = app.listen(port, host, () => {
    log.info('server_started', {
      host,
      port,
      version: getVersionInfo().version,
      config_file: config.configFile,
      remote_servers: config.remoteServers.length
    });
  });

  let shuttingDown = false;
  const shutdown = (signal: string): void => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    log.info('server_stopping', { signal });

    const forceExit = setTimeout(() => {
      log.warn('server_shutdown_timeout', { timeout_ms: SHUTDOWN_TIMEOUT_MS });
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    forceExit.unref();

    // Open SSE streams end when the engine closes their subscribers.
    server.close();
    engine
      .close()
      .then(() => {
        log.info('server_stopped');
        process.exit(0);
      })
      .catch((error: unknown) => {
        log.error('server_shutdown_failed', { error: errMessage(error) });
        process.exit(1);
      });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((error: unknown) => {
  log.error('server_start_failed', { error: errMessage(error) });
  process.exit(1);
});
