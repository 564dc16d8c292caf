import type { ServerConfig } from './config.js';
import { closeDatabase, initDatabase } from './db/index.js';
import { buildApp, type AppDependencies } from './app.js';

export type LearningsServer = Awaited<ReturnType<typeof buildApp>>;

/**
 * Open the store, build the app and start listening on the configured
 * address. Whatever was opened is closed again when startup fails.
 */
export async function startServer(config: ServerConfig, deps: AppDependencies = {}): Promise<LearningsServer> {
  const db = await initDatabase(config.dbPath);
  let app: LearningsServer;
  try {
    app = await buildApp(config, db, deps);
  } catch (err) {
    closeDatabase(db);
    throw err;
  }

  try {
    await app.listen({ port: config.port, host: config.host });
  } catch (err) {
    await app.close();
    throw err;
  }

  app.log.info(`Learnings daemon running on http://${config.host}:${config.port}`);
  return app;
}
