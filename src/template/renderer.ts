/**
 * Template Renderer: flat `{name}` substitution
 *
 * Pure functions. The substitution namespace is exactly the recipient's own
 * CSV fields; nothing else is in scope.
 *
 * - Placeholders are `{identifier}` ([A-Za-z_][A-Za-z0-9_]*), case-sensitive.
 *   Braces around anything else (`p {color: red}` in a <style> block) are
 *   left as-is.
 * - All-or-nothing: if any placeholder has no field, nothing is rendered and
 *   a ValidationError names every missing field. An existing field with an
 *   empty value renders as ''.
 * - Single pass: a substituted value containing `{x}` is not expanded again.
 */

import { ValidationError } from '../errors.js';
import type { RecipientRecord } from '../recipients/types.js';
import type { RenderOutcome, RenderedTemplate, Template } from './types.js';

const PLACEHOLDER = /\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

/** Distinct placeholder names in order of first appearance. */
export function findPlaceholders(template: string): string[] {
  const names = new Set<string>();
  for (const match of template.matchAll(PLACEHOLDER)) {
    names.add(match[1]);
  }
  return [...names];
}

/**
 * Substitutes `fields` into one template string.
 * Returns the missing names instead of a partial result.
 */
export function renderString(
  template: string,
  fields: Readonly<Record<string, string>>,
): { ok: true; value: string } | { ok: false; missing: string[] } {
  const missing = findPlaceholders(template).filter(name => !Object.hasOwn(fields, name));
  if (missing.length > 0) {
    return { ok: false, missing };
  }

  // Replacer function: values are inserted verbatim ($& etc. not interpreted)
  const value = template.replace(PLACEHOLDER, (_token, name: string) => fields[name]);
  return { ok: true, value };
}

/**
 * Renders subject, HTML and optional text templates for one recipient.
 */
export function renderTemplate(template: Template, record: RecipientRecord): RenderOutcome {
  const parts: Array<[keyof RenderedTemplate, string | undefined]> = [
    ['subject', template.subject],
    ['html', template.html],
    ['text', template.text],
  ];

  const rendered: RenderedTemplate = { subject: '', html: '' };
  const missing = new Set<string>();

  for (const [key, source] of parts) {
    if (source === undefined) continue;
    const result = renderString(source, record.fields);
    if (result.ok) {
      rendered[key] = result.value;
    } else {
      result.missing.forEach(name => missing.add(name));
    }
  }

  if (missing.size > 0) {
    const names = [...missing];
    return {
      ok: false,
      error: new ValidationError(
        `Unresolved placeholder(s) ${names.map(n => `{${n}}`).join(', ')}: ` +
          'no such column for this recipient',
        names,
      ),
    };
  }

  return { ok: true, rendered };
}
