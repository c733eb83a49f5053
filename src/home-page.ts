import type { PluginManifest } from './plugins/index.js';

export interface PluginSummary {
  name: string;
  manifest: PluginManifest;
}

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

export function renderPluginItem({ name, manifest }: PluginSummary): string {
  const version = manifest.plugin_version ? ` v${escapeHtml(manifest.plugin_version)}` : '';
  const description = escapeHtml(manifest.plugin_description ?? 'No description');
  return `<li><strong>${escapeHtml(name)}</strong>${version} - ${description}</li>`;
}

/** Landing page listing loaded plugins. */
export function renderHomePage(plugins: PluginSummary[]): string {
  const list = plugins.length > 0
    ? `<h2>Loaded plugins:</h2>\n      <ul>\n${plugins.map((p) => `        ${renderPluginItem(p)}`).join('\n')}\n      </ul>`
    : '';

  return `<!DOCTYPE html>
<html>
  <head>
    <meta charset="utf-8">
    <title>Plugin Host</title>
    <style>
      body { font-family: Arial, sans-serif; margin: 40px; line-height: 1.6; }
      h1 { color: #333; }
      .info { background-color: #f5f5f5; padding: 15px; border-radius: 5px; margin: 20px 0; }
      li { margin: 5px 0; }
    </style>
  </head>
  <body>
    <h1>Plugin Host</h1>
    <div class="info">
      <p>Server is running.</p>
      ${list}
    </div>
  </body>
</html>
`;
}
