/**
 * mdpipe - extensible Markdown to HTML converter
 */

// High-level conversion API
export { Converter, convertToHtml, createConverter } from './converter.js';

// Types
export type { ConvertMetadata, ConvertOptions, ConvertResult, ConverterOptions } from './types.js';

// Core
export * from './core/index.js';

// Bundled plugins
export * from './extensions/index.js';
