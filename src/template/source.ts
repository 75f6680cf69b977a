/**
 * Template Source Loading
 *
 * `--subject`, `--html` and `--text` accept either the template itself or
 * `@path`, meaning "read the template from this file" (UTF-8).
 */

import { readFile } from 'node:fs/promises';
import { ConfigError, errorMessage } from '../errors.js';
import type { Template, TemplateSources } from './types.js';

/**
 * Resolves one template source.
 *
 * @throws ConfigError if an `@path` file cannot be read
 */
export async function loadTemplateSource(value: string): Promise<string> {
  if (!value.startsWith('@')) return value;

  const path = value.slice(1);
  try {
    return await readFile(path, 'utf-8');
  } catch (err) {
    throw new ConfigError(
      `Cannot read template file ${path}: ${errorMessage(err)}`,
      'TEMPLATE_UNREADABLE',
    );
  }
}

/** Loads subject, HTML and optional text templates for a run. */
export async function loadTemplate(sources: TemplateSources): Promise<Template> {
  const [subject, html, text] = await Promise.all([
    loadTemplateSource(sources.subject),
    loadTemplateSource(sources.html),
    sources.text === undefined ? Promise.resolve(undefined) : loadTemplateSource(sources.text),
  ]);

  return text === undefined ? { subject, html } : { subject, html, text };
}
