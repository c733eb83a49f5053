/**
 * Plugin Context & Dependency Injection
 * Plugins receive their own root and manifest here instead of relying on a
 * process-wide module search path.
 */

import type { Logger, PluginContext, PluginManifest } from './types.js';

/** Wrap a logger so every message names the plugin it came from. */
function prefixedLogger(name: string, logger: Logger): Logger {
  const tag = `[${name}]`;
  return {
    info: (msg, ...args) => logger.info(`${tag} ${msg}`, ...args),
    warn: (msg, ...args) => logger.warn(`${tag} ${msg}`, ...args),
    error: (msg, ...args) => logger.error(`${tag} ${msg}`, ...args),
    debug: (msg, ...args) => logger.debug(`${tag} ${msg}`, ...args),
  };
}

export function createPluginContext(
  name: string,
  rootPath: string,
  manifest: PluginManifest,
  logger: Logger,
): PluginContext {
  return {
    name,
    rootPath,
    manifest: { ...manifest },
    logger: prefixedLogger(name, logger),
  };
}
