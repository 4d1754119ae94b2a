/**
 * Barrel export for all shared types.
 */
export { createPaper, paperKey, UNTITLED } from './paper.js';
export type { Paper, PaperInit } from './paper.js';
export { DEFAULT_CONFIG } from './config.js';
export type { LitSearchConfig, NcbiConfig, LogLevel } from './config.js';
export type { SourceAdapter, SourceAdapterOptions, SourceRegistration } from './source-adapter.js';
