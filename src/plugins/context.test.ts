import { describe, it, expect, vi } from 'vitest';
import { createPluginContext } from './context.js';
import type { Logger } from './types.js';

describe('createPluginContext', () => {
  it('should carry the plugin root and a copy of the manifest', () => {
    const manifest = { plugin_version: '1.0' };
    const logger: Logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
    const ctx = createPluginContext('ILL', '/srv/plugin/ILL', manifest, logger);

    expect(ctx.name).toBe('ILL');
    expect(ctx.rootPath).toBe('/srv/plugin/ILL');
    expect(ctx.manifest).toEqual({ plugin_version: '1.0' });
    expect(ctx.manifest).not.toBe(manifest);
  });

  it('should prefix log messages with the plugin name', () => {
    const logger: Logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
    const ctx = createPluginContext('TTS', '/srv/plugin/TTS', {}, logger);

    ctx.logger.warn('voice %s missing', 'alto');
    ctx.logger.info('ready');

    expect(logger.warn).toHaveBeenCalledWith('[TTS] voice %s missing', 'alto');
    expect(logger.info).toHaveBeenCalledWith('[TTS] ready');
  });
});
