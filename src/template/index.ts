// ============================================================================
// Template Module: Barrel Export
// ============================================================================

export type { Template, TemplateSources, RenderedTemplate, RenderOutcome } from './types.js';

export { loadTemplate, loadTemplateSource } from './source.js';
export { renderTemplate, renderString, findPlaceholders } from './renderer.js';
