import cors from 'cors';
import express from 'express';

import type { DispatchSurface } from './dispatch.js';
import { renderHomePage } from './home-page.js';
import type { PluginManifest } from './plugins/index.js';

/** Read side of the plugin manager used by the built-in routes. */
export interface PluginDirectory {
  listPlugins(): string[];
  getPluginInfo(name: string): PluginManifest;
}

/** Plugin name -> manifest, in load order. */
export function pluginsDocument(plugins: PluginDirectory): Record<string, PluginManifest> {
  return Object.fromEntries(plugins.listPlugins().map((name) => [name, plugins.getPluginInfo(name)]));
}

/**
 * Built-in routes. Bound before plugins load so they win over plugin routes
 * on the same path and show up when a catch-all plugin inspects the surface.
 */
export function registerHostRoutes(surface: DispatchSurface, plugins: PluginDirectory): void {
  surface.get('/plugins', (_req, res) => {
    res.json(pluginsDocument(plugins));
  });

  surface.get('/', (_req, res) => {
    const summaries = plugins.listPlugins().map((name) => ({ name, manifest: plugins.getPluginInfo(name) }));
    res.type('html').send(renderHomePage(summaries));
  });
}

export function createApp(surface: DispatchSurface): express.Express {
  const app = express();
  app.use(cors({ origin: true, credentials: true }));
  app.use(express.json());
  app.use(surface.router);
  return app;
}
