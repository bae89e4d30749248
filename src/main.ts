import { loadConfig } from './config.js';
import { createServer } from './server.js';

async function start() {
  const config = loadConfig();
  const app = await createServer({ config });

  await app.listen({ port: config.port, host: config.host });
  app.log.info({ port: config.port, repo: config.repo.kind, source: config.source.kind }, 'Extraction service started');

  // Graceful shutdown
  const signals = ['SIGINT', 'SIGTERM'] as const;
  for (const signal of signals) {
    process.on(signal, async () => {
      app.log.info({ signal }, 'Shutting down');
      try {
        await app.close();
        process.exit(0);
      } catch (error) {
        app.log.error({ error }, 'Error during shutdown');
        process.exit(1);
      }
    });
  }
}

start().catch((error) => {
  console.error('Failed to start server:', error);
  process.exit(1);
});
