/**
 * Template Module Type Definitions
 */

import type { ValidationError } from '../errors.js';

/** Raw templates for one run, shared read-only by every recipient */
export interface Template {
  subject: string;
  html: string;
  /** Optional plain-text alternative body */
  text?: string;
}

/** Template sources as given on the command line: literal text or `@path` */
export interface TemplateSources {
  subject: string;
  html: string;
  text?: string;
}

export interface RenderedTemplate {
  subject: string;
  html: string;
  text?: string;
}

export type RenderOutcome =
  | { ok: true; rendered: RenderedTemplate }
  | { ok: false; error: ValidationError };
