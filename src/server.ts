import { config as loadEnv } from 'dotenv';
import { buildApp } from './app.js';
import { loadConfig } from './config/index.js';

loadEnv();

process.on('unhandledRejection', (reason, promise) => {
  console.error('Unhandled Rejection at:', promise, 'reason:', reason);
  process.exit(1);
});

const start = async () => {
  const config = loadConfig();
  const app = buildApp({ config });

  const shutdown = async (signal: NodeJS.Signals) => {
    app.log.info({ signal }, 'Shutting down');
    await app.close();
    process.exit(0);
  };
  process.once('SIGINT', signal => void shutdown(signal));
  process.once('SIGTERM', signal => void shutdown(signal));

  try {
    await app.listen({ port: config.server.port, host: config.server.host });
    app.log.info({ dataFile: config.persistence.dataFile, provider: config.persistence.provider }, 'Item store ready');
  } catch (err) {
    app.log.error(err, 'Error starting server');
    process.exit(1);
  }
};

void start();
