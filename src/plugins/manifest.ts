/**
 * Manifest Reader
 * Parses plugin.cfg: `key = value` lines, `#` comments, no sections.
 */

import fs from 'fs';
import path from 'path';

import { ManifestNotFoundError, ManifestReadError } from './errors.js';
import type { PluginManifest } from './types.js';

const COMMENT_MARKER = '#';

/** Parse manifest text. Malformed lines are skipped; the last duplicate key wins. */
export function parseManifest(text: string): PluginManifest {
  const entries = new Map<string, string>();

  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim();
    if (!line || line.startsWith(COMMENT_MARKER)) continue;

    const eq = line.indexOf('=');
    if (eq === -1) continue;

    entries.set(line.slice(0, eq).trim(), line.slice(eq + 1).trim());
  }

  return Object.fromEntries(entries);
}

export function readManifest(manifestPath: string): PluginManifest {
  const plugin = path.basename(path.dirname(manifestPath));
  let text: string;
  try {
    text = fs.readFileSync(manifestPath, 'utf-8');
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') {
      throw new ManifestNotFoundError(plugin, manifestPath, { cause: err });
    }
    throw new ManifestReadError(plugin, manifestPath, { cause: err });
  }
  return parseManifest(text);
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}
