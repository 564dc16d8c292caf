import 'dotenv/config';
import { loadConfig } from './config.js';
import { startServer } from './server.js';

async function main() {
  const app = await startServer(loadConfig());

  const shutdown = (signal: NodeJS.Signals) => {
    app.log.info({ signal }, 'shutting down');
    app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        app.log.error({ err }, 'shutdown failed');
        process.exit(1);
      },
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((err: unknown) => {
  console.error('Failed to start learnings daemon:', err);
  process.exit(1);
});
