/** Error hierarchy for plugin discovery and loading. */

export class PluginError extends Error {
  readonly plugin: string;

  constructor(plugin: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'PluginError';
    this.plugin = plugin;
  }
}

/** plugin.cfg does not exist. */
export class ManifestNotFoundError extends PluginError {
  constructor(plugin: string, manifestPath: string, options?: ErrorOptions) {
    super(plugin, `manifest not found: ${manifestPath}`, options);
    this.name = 'ManifestNotFoundError';
  }
}

/** plugin.cfg exists but could not be read. */
export class ManifestReadError extends PluginError {
  constructor(plugin: string, manifestPath: string, options?: ErrorOptions) {
    super(plugin, `cannot read manifest ${manifestPath}: ${describeError(options?.cause)}`, options);
    this.name = 'ManifestReadError';
  }
}

export class EntryNotFoundError extends PluginError {
  constructor(plugin: string, entryFile: string, options?: ErrorOptions) {
    super(plugin, `entry file ${entryFile} not found`, options);
    this.name = 'EntryNotFoundError';
  }
}

export class PluginLoadError extends PluginError {
  constructor(plugin: string, message: string, options?: ErrorOptions) {
    super(plugin, message, options);
    this.name = 'PluginLoadError';
  }
}

/** The plugin's registration function threw. */
export class RegistrationError extends PluginError {
  constructor(plugin: string, symbol: string, options?: ErrorOptions) {
    super(plugin, `${symbol}() failed: ${describeError(options?.cause)}`, options);
    this.name = 'RegistrationError';
  }
}

export class PluginTimeoutError extends PluginError {
  constructor(plugin: string, step: string, timeoutMs: number) {
    super(plugin, `${step} timed out after ${timeoutMs}ms`);
    this.name = 'PluginTimeoutError';
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
