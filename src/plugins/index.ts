/**
 * Plugin System — re-exports
 */

export {
  PluginManager,
  DEFAULT_PRIORITY_PLUGINS,
  DEFAULT_FALLBACK_PLUGIN,
  type PluginManagerOptions,
} from './manager.js';
export { PluginRegistry } from './registry.js';
export { parseManifest, readManifest } from './manifest.js';
export { loadPluginModule, resolveEntryFile, DEFAULT_ENTRY_EXTENSION } from './loader.js';
export { invokeRegistrar, registrationSymbol, type RouteRegistrar } from './registrar.js';
export { createPluginContext } from './context.js';
export {
  PluginError,
  ManifestNotFoundError,
  ManifestReadError,
  EntryNotFoundError,
  PluginLoadError,
  RegistrationError,
  PluginTimeoutError,
  describeError,
} from './errors.js';
export type {
  PluginManifest,
  PluginRecord,
  PluginContext,
  ModuleHandle,
  RegistrationOutcome,
  LoadOutcome,
  SkipReason,
  Logger,
} from './types.js';
export { PluginManifestSchema, MANIFEST_FILE } from './types.js';
