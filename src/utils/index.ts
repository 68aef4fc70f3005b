// utils/index.ts
// ==========================
// 📦 Utility Exports
// ==========================

export { formatLocation, formatDiagnostic, formatDiagnostics, formatSummary, describeError } from './format.js';
export type { FormatOptions } from './format.js';
export { highlightSnippet, getLocationFromOffset } from './highlight.js';
export type { SnippetOptions } from './highlight.js';
export { defaultLocation, toLocation, compareLocations } from './types.js';
export type { Location, Position } from './types.js';
