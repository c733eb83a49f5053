/**
 * Route Registrar Invoker
 * Finds `register_<name>_routes` on a loaded module and calls it.
 */

import type { DispatchSurface } from '../dispatch.js';
import { DEFAULT_TIMEOUT_MS, withTimeout } from './timeout.js';
import type { ModuleHandle, PluginContext, RegistrationOutcome } from './types.js';

export type RouteRegistrar = (surface: DispatchSurface, context: PluginContext) => unknown;

/** `My-Plugin` -> `register_my_plugin_routes` */
export function registrationSymbol(pluginName: string): string {
  return `register_${pluginName.toLowerCase().replaceAll('-', '_')}_routes`;
}

export interface RegistrarOptions {
  timeoutMs?: number;
}

/**
 * Errors thrown by the registration function propagate; containment is the
 * caller's job.
 */
export async function invokeRegistrar(
  handle: ModuleHandle,
  pluginName: string,
  surface: DispatchSurface,
  context: PluginContext,
  options: RegistrarOptions = {},
): Promise<RegistrationOutcome> {
  const symbol = registrationSymbol(pluginName);
  const register = handle[symbol];
  if (!isRouteRegistrar(register)) return 'entry-point-missing';

  // The plugin binds through its own view. Closing it once the call settles
  // or times out means a registration still running in the background
  // cannot add routes afterwards.
  const scoped = surface.scope(pluginName);
  try {
    await withTimeout(
      Promise.resolve(register(scoped, context)),
      pluginName,
      `${symbol}()`,
      options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    );
  } finally {
    scoped.close();
  }
  return 'registered';
}

function isRouteRegistrar(value: unknown): value is RouteRegistrar {
  return typeof value === 'function';
}
