/**
 * Module Loader
 * Resolves a plugin's entry file from its manifest and imports it.
 */

import fs from 'fs';
import path from 'path';

import { EntryNotFoundError, PluginLoadError, describeError } from './errors.js';
import { DEFAULT_TIMEOUT_MS, withTimeout } from './timeout.js';
import type { ModuleHandle, PluginManifest } from './types.js';

export const DEFAULT_ENTRY_EXTENSION = '.js';

export interface LoaderOptions {
  /** Upper bound for evaluating the entry module (ms). */
  timeoutMs?: number;
}

/** `plugin_main_file`, or the lower-cased plugin name plus `.js`. */
export function resolveEntryFile(pluginName: string, manifest: PluginManifest): string {
  return manifest.plugin_main_file ?? `${pluginName.toLowerCase()}${DEFAULT_ENTRY_EXTENSION}`;
}

export async function loadPluginModule(
  pluginRoot: string,
  manifest: PluginManifest,
  options: LoaderOptions = {},
): Promise<ModuleHandle> {
  const root = path.resolve(pluginRoot);
  const name = path.basename(root);
  const entryFile = resolveEntryFile(name, manifest);
  const entryPoint = path.resolve(root, entryFile);

  if (!fs.existsSync(entryPoint)) {
    throw new EntryNotFoundError(name, entryFile);
  }

  let mod: unknown;
  try {
    mod = await withTimeout(
      import(entryPoint),
      name,
      `import of ${entryFile}`,
      options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    );
  } catch (err) {
    throw new PluginLoadError(name, `cannot load ${entryFile}: ${describeError(err)}`, { cause: err });
  }

  if (!isModuleHandle(mod)) {
    throw new PluginLoadError(name, `${entryFile} did not evaluate to a module`);
  }
  return mod;
}

function isModuleHandle(value: unknown): value is ModuleHandle {
  return typeof value === 'object' && value !== null;
}
