/**
 * Plugin Registry
 * Successfully loaded plugins, keyed by directory name, in load order.
 */

import type { PluginManifest, PluginRecord } from './types.js';

export class PluginRegistry {
  private records = new Map<string, PluginRecord>();

  add(record: PluginRecord): void {
    if (this.records.has(record.name)) {
      throw new Error(`Plugin "${record.name}" is already registered`);
    }
    this.records.set(record.name, record);
  }

  has(name: string): boolean {
    return this.records.has(name);
  }

  get(name: string): PluginRecord | undefined {
    return this.records.get(name);
  }

  /** Plugin names in load order. */
  list(): string[] {
    return [...this.records.keys()];
  }

  /** Manifest of a loaded plugin, or `{}` for an unknown name. */
  getInfo(name: string): PluginManifest {
    return this.records.get(name)?.manifest ?? {};
  }

  get size(): number {
    return this.records.size;
  }
}
