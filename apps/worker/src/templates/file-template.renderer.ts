import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { DeliveryError, logger } from '@mailq/shared';
import type { RenderedContent, TemplateRenderer } from './template.renderer';

const TEMPLATE_ID = /^[A-Za-z0-9_-]+$/;
const PLACEHOLDER = /\{\{\s*([A-Za-z_][\w.]*)\s*\}\}/g;

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

/**
 * Renders `<dir>/<templateId>.html` and `<dir>/<templateId>.txt`, replacing
 * `{{ name }}` placeholders (dotted paths allowed) with template variables.
 * Values are HTML-escaped in the html variant. At least one variant must exist.
 */
export class FileTemplateRenderer implements TemplateRenderer {
  constructor(private readonly dir: string) {}

  async render(
    templateId: string,
    vars: Record<string, unknown>,
  ): Promise<RenderedContent> {
    if (!TEMPLATE_ID.test(templateId)) {
      throw new DeliveryError(
        `template id ${JSON.stringify(templateId)} is not valid`,
        false,
        'ETEMPLATE',
      );
    }

    const [html, text] = await Promise.all([
      this.load(`${templateId}.html`),
      this.load(`${templateId}.txt`),
    ]);
    if (html === undefined && text === undefined) {
      throw new DeliveryError(
        `template ${templateId} not found`,
        false,
        'ETEMPLATE',
      );
    }

    const rendered: RenderedContent = {
      html: html === undefined ? undefined : fill(templateId, html, vars, escapeHtml),
      text: text === undefined ? undefined : fill(templateId, text, vars, (value) => value),
    };
    logger.debug(
      { service: 'worker', template_id: templateId },
      'template rendered',
    );
    return rendered;
  }

  private async load(file: string): Promise<string | undefined> {
    try {
      return await readFile(path.join(this.dir, file), 'utf8');
    } catch (error) {
      if (readCode(error) === 'ENOENT') {
        return undefined;
      }
      throw error;
    }
  }
}

function fill(
  templateId: string,
  source: string,
  vars: Record<string, unknown>,
  escape: (value: string) => string,
): string {
  return source.replace(PLACEHOLDER, (_match, name: string) => {
    const value = lookup(vars, name);
    if (value === undefined || value === null) {
      throw new DeliveryError(
        `template ${templateId} is missing variable ${name}`,
        false,
        'ETEMPLATE',
      );
    }
    return escape(stringify(value));
  });
}

function lookup(vars: Record<string, unknown>, name: string): unknown {
  let current: unknown = vars;
  for (const key of name.split('.')) {
    if (typeof current !== 'object' || current === null || !(key in current)) {
      return undefined;
    }
    current = Reflect.get(current, key);
  }
  return current;
}

function stringify(value: unknown): string {
  return typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
    ? String(value)
    : JSON.stringify(value);
}

function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

function readCode(error: unknown): unknown {
  return typeof error === 'object' && error !== null && 'code' in error
    ? Reflect.get(error, 'code')
    : undefined;
}
