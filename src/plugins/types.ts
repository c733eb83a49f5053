/**
 * Plugin System Types & Manifest Schema
 */

import { z } from 'zod';

// --- Plugin Manifest (plugin.cfg) ---

/**
 * Typed view of a parsed plugin.cfg. Every key is optional and unknown keys
 * are kept as-is. The parser builds the object directly rather than through
 * `parse()`, which would strip a `__proto__` key.
 */
export const PluginManifestSchema = z
  .object({
    plugin_main_file: z.string().optional(),
    plugin_description: z.string().optional(),
    plugin_version: z.string().optional(),
  })
  .catchall(z.string());

export type PluginManifest = z.infer<typeof PluginManifestSchema>;

export const MANIFEST_FILE = 'plugin.cfg';

// --- Logger interface ---

export interface Logger {
  info(msg: string, ...args: unknown[]): void;
  warn(msg: string, ...args: unknown[]): void;
  error(msg: string, ...args: unknown[]): void;
  debug(msg: string, ...args: unknown[]): void;
}

// --- Loaded module ---

/** Namespace object of a plugin's entry module, keyed by export name. */
export type ModuleHandle = Readonly<Record<string, unknown>>;

// --- Plugin Context ---

/** Handed to a plugin's registration function next to the dispatch surface. */
export interface PluginContext {
  name: string;
  rootPath: string;
  manifest: PluginManifest;
  logger: Logger;
}

// --- Registry records & load outcomes ---

export type RegistrationOutcome = 'registered' | 'entry-point-missing';

export interface PluginRecord {
  name: string;
  manifest: PluginManifest;
  module: ModuleHandle;
  rootPath: string;
  registration: RegistrationOutcome;
}

export type SkipReason = 'manifest-absent' | 'already-loaded';

export type LoadOutcome =
  | { status: 'loaded'; name: string; record: PluginRecord }
  | { status: 'skipped'; name: string; reason: SkipReason }
  | { status: 'failed'; name: string; error: Error };
