/**
 * Plugin Manager
 * Walks the plugin root in priority order, loads each plugin and wires its
 * routes into the dispatch surface. One plugin failing never stops the rest.
 */

import fs from 'fs';
import path from 'path';

import type { DispatchSurface } from '../dispatch.js';
import { createPluginContext } from './context.js';
import { PluginError, RegistrationError, describeError } from './errors.js';
import { loadPluginModule } from './loader.js';
import { readManifest } from './manifest.js';
import { invokeRegistrar, registrationSymbol } from './registrar.js';
import { PluginRegistry } from './registry.js';
import { DEFAULT_TIMEOUT_MS } from './timeout.js';
import {
  MANIFEST_FILE,
  type LoadOutcome,
  type Logger,
  type PluginManifest,
  type PluginRecord,
} from './types.js';

/** Loaded first, in this order, when present. */
export const DEFAULT_PRIORITY_PLUGINS: readonly string[] = ['ILL', 'TTS', 'AntiPublic-Web'];

/**
 * Registers a catch-all route and checks the surface for existing routes
 * itself, so it goes after every priority plugin.
 */
export const DEFAULT_FALLBACK_PLUGIN = 'GitHub';

export interface PluginManagerOptions {
  logger: Logger;
  priority?: readonly string[];
  fallback?: string;
  /** Bound for importing one entry module and for one registration call (ms). */
  timeoutMs?: number;
}

export class PluginManager {
  private registry = new PluginRegistry();
  private logger: Logger;
  private priority: readonly string[];
  private fallback: string;
  private timeoutMs: number;

  constructor(options: PluginManagerOptions) {
    this.logger = options.logger;
    this.priority = options.priority ?? DEFAULT_PRIORITY_PLUGINS;
    this.fallback = options.fallback ?? DEFAULT_FALLBACK_PLUGIN;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  /** Load every plugin under `pluginsRoot`, one at a time. Never rejects. */
  async loadAll(pluginsRoot: string, surface: DispatchSurface): Promise<LoadOutcome[]> {
    if (!isDirectory(pluginsRoot)) {
      this.logger.info(`Plugin directory ${pluginsRoot} not found`);
      return [];
    }

    let plan: string[];
    try {
      plan = this.discover(pluginsRoot);
    } catch (err) {
      this.logger.error(`Cannot read plugin directory ${pluginsRoot}: ${describeError(err)}`);
      return [];
    }
    if (plan.length === 0) {
      this.logger.info(`No plugins in ${pluginsRoot}`);
      return [];
    }

    const outcomes: LoadOutcome[] = [];
    for (const name of plan) {
      outcomes.push(await this.loadPlugin(path.join(pluginsRoot, name), surface));
    }
    return outcomes;
  }

  /**
   * Plugin directory names in load order: priority plugins, then the
   * fallback plugin, then the rest as the directory lists them.
   */
  discover(pluginsRoot: string): string[] {
    if (!isDirectory(pluginsRoot)) return [];

    const plan: string[] = [];
    const planned = new Set<string>();
    const take = (name: string) => {
      if (planned.has(name) || !isDirectory(path.join(pluginsRoot, name))) return;
      planned.add(name);
      plan.push(name);
    };

    for (const name of this.priority) take(name);
    take(this.fallback);

    for (const entry of fs.readdirSync(pluginsRoot)) take(entry);

    return plan;
  }

  /** Run the load sequence for a single plugin directory. */
  async loadPlugin(pluginDir: string, surface: DispatchSurface): Promise<LoadOutcome> {
    const name = path.basename(pluginDir);

    if (this.registry.has(name)) {
      this.logger.warn(`Plugin "${name}" already loaded, skipping`);
      return { status: 'skipped', name, reason: 'already-loaded' };
    }

    const manifestPath = path.join(pluginDir, MANIFEST_FILE);
    if (!fs.existsSync(manifestPath)) {
      this.logger.info(`Plugin "${name}": ${MANIFEST_FILE} not found, skipping`);
      return { status: 'skipped', name, reason: 'manifest-absent' };
    }

    try {
      const record = await this.loadRecord(name, pluginDir, manifestPath, surface);
      this.registry.add(record);
      return { status: 'loaded', name, record };
    } catch (err) {
      const error = err instanceof Error ? err : new PluginError(name, describeError(err));
      this.logger.error(`Failed to load plugin "${name}": ${error.message}`);
      return { status: 'failed', name, error };
    }
  }

  private async loadRecord(
    name: string,
    pluginDir: string,
    manifestPath: string,
    surface: DispatchSurface,
  ): Promise<PluginRecord> {
    const manifest = readManifest(manifestPath);
    const mod = await loadPluginModule(pluginDir, manifest, { timeoutMs: this.timeoutMs });
    const context = createPluginContext(name, pluginDir, manifest, this.logger);

    let registration: PluginRecord['registration'];
    try {
      registration = await invokeRegistrar(mod, name, surface, context, { timeoutMs: this.timeoutMs });
    } catch (err) {
      throw new RegistrationError(name, registrationSymbol(name), { cause: err });
    }

    if (registration === 'registered') {
      this.logger.info(`Plugin "${name}" loaded and registered`);
    } else {
      this.logger.info(`Plugin "${name}": ${registrationSymbol(name)} not found, no routes registered`);
    }

    return { name, manifest, module: mod, rootPath: pluginDir, registration };
  }

  // --- Introspection ---

  /** Names of loaded plugins, in load order. */
  listPlugins(): string[] {
    return this.registry.list();
  }

  /** Manifest of a loaded plugin, or `{}` if no such plugin was loaded. */
  getPluginInfo(name: string): PluginManifest {
    return this.registry.getInfo(name);
  }

  getPlugin(name: string): PluginRecord | undefined {
    return this.registry.get(name);
  }
}

function isDirectory(p: string): boolean {
  try {
    return fs.statSync(p).isDirectory();
  } catch {
    return false; // missing, or a path component is not a directory
  }
}
