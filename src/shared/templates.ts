/**
 * Email Templates
 * ===============
 * Loads `<name>.html` from the templates directory and substitutes
 * `{{variable}}` placeholders. Values are HTML-escaped.
 */

import { readFile } from "node:fs/promises";
import path from "node:path";

import { ConfigurationError } from "./errors.js";

export type TemplateVariables = Record<string, string | number>;

export interface TemplateRenderer {
  render(name: string, variables?: TemplateVariables): Promise<string>;
}

const PLACEHOLDER = /\{\{\s*([A-Za-z_][A-Za-z0-9_]*)\s*\}\}/g;
const TEMPLATE_NAME = /^[a-z0-9_-]+$/i;

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

export function createTemplateRenderer(templatesDir: string): TemplateRenderer {
  const dir = path.resolve(templatesDir);
  const cache = new Map<string, string>();

  async function load(name: string): Promise<string> {
    if (!TEMPLATE_NAME.test(name)) {
      throw new ConfigurationError(`invalid template name '${name}'`);
    }
    const cached = cache.get(name);
    if (cached !== undefined) {return cached;}

    let content: string;
    try {
      content = await readFile(path.join(dir, `${name}.html`), "utf8");
    } catch {
      throw new ConfigurationError(`template '${name}' not found in ${dir}`);
    }
    cache.set(name, content);
    return content;
  }

  return {
    async render(name, variables = {}) {
      const content = await load(name);
      const missing = new Set<string>();
      const rendered = content.replace(PLACEHOLDER, (_match, key: string) => {
        const value = variables[key];
        if (value === undefined) {
          missing.add(key);
          return "";
        }
        return escapeHtml(String(value));
      });

      if (missing.size > 0) {
        throw new ConfigurationError(
          `missing template variable(s) for '${name}': ${Array.from(missing).join(", ")}`
        );
      }
      return rendered;
    },
  };
}
