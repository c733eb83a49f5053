/**
 * Plugin Host — loads plugins from PLUGIN_DIR, then serves their routes.
 */
import { HOST, PLUGIN_DIR, PLUGIN_LOAD_TIMEOUT_MS, PORT } from './config.js';
import { DispatchSurface } from './dispatch.js';
import { logger } from './logger.js';
import { PluginManager } from './plugins/index.js';
import { createApp, registerHostRoutes } from './server.js';

async function main(): Promise<void> {
  logger.info('Starting plugin host');

  const surface = new DispatchSurface();
  const manager = new PluginManager({ logger, timeoutMs: PLUGIN_LOAD_TIMEOUT_MS });
  registerHostRoutes(surface, manager);

  logger.info({ dir: PLUGIN_DIR }, 'Loading plugins');
  await manager.loadAll(PLUGIN_DIR, surface);

  const loaded = manager.listPlugins();
  logger.info(`Loaded plugins: ${loaded.length}`);
  for (const name of loaded) {
    const info = manager.getPluginInfo(name);
    logger.info(`  - ${name} v${info.plugin_version ?? 'unknown'}`);
  }

  const app = createApp(surface);
  const server = app.listen(PORT, HOST, () => {
    logger.info({ host: HOST, port: PORT }, `Plugin host listening on http://${HOST}:${PORT}`);
  });
  server.on('error', (err) => {
    logger.error({ err }, 'Server error');
    process.exit(1);
  });
}

main().catch((err) => {
  logger.error({ err }, 'Failed to start plugin host');
  process.exit(1);
});
