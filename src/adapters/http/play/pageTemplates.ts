import { promises as fs } from 'node:fs';
import path from 'node:path';

export type PageName = 'now_playing' | 'offer_source' | 'no_track';

/**
 * Loads the HTML pages under the templates directory and fills their
 * `{{NAME}}` placeholders with escaped values. Unknown placeholders render empty.
 */
export class PageTemplates {
  private readonly cache = new Map<PageName, string>();

  constructor(private readonly templatesDir: string) {}

  public async render(name: PageName, values: Record<string, string | number>): Promise<string> {
    const template = await this.load(name);
    return template.replace(/\{\{([A-Z_]+)\}\}/g, (_match, key: string) => {
      const value = values[key];
      return value === undefined ? '' : escapeHtml(String(value));
    });
  }

  private async load(name: PageName): Promise<string> {
    const cached = this.cache.get(name);
    if (cached !== undefined) {
      return cached;
    }
    const template = await fs.readFile(path.join(this.templatesDir, `${name}.html`), 'utf-8');
    this.cache.set(name, template);
    return template;
  }
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}
