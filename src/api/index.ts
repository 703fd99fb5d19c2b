import { loadConfig } from '../shared/config';
import { logger } from '../shared/logger';
import { createApp } from './app';
import { createAccountStore } from './store/accountStore';

// Initialize and start
async function start(): Promise<void> {
  const config = loadConfig();
  logger.setLevel(config.logLevel);

  const store = createAccountStore(config);
  await store.connect();

  const { app, authService } = createApp({ token: config.token, store });

  if (config.admin) {
    await authService.seedAdmin(config.admin.username, config.admin.password);
  }

  const port = config.port;
  app.listen(port, () => {
    logger.info('API listening', {
      port,
      store: config.store.kind,
      algorithm: config.token.algorithm,
      tokenTtlMinutes: config.token.ttlMinutes,
    });
  });
}

if (require.main === module) {
  start().catch((error: unknown) => {
    logger.error('Startup failed', error instanceof Error ? error : { error: String(error) });
    process.exit(1);
  });
}

export { start };
