/**
 * Statement Formats
 *
 * Every bank layout implements the StatementFormat interface: it decides
 * which lines of a document are candidates (segment) and reads a single
 * candidate line (extract).
 *
 * To add support for a new layout:
 * 1. Create a new file (e.g., hdfcSavings.ts) implementing StatementFormat
 * 2. Register it with parserRegistry.register(...) or pass it to a new
 *    StatementFormatRegistry
 */

export * from './types';
export * from './categorizer';
export * from './segmenter';
export { extractStatement, sortByDateDescending } from './extractor';
export type { ExtractionResult } from './extractor';
export { parserRegistry, StatementFormatRegistry } from './registry';
export { axisCreditFormat, AxisCreditFormat } from './axisCredit';
export { axisSavingsFormat, AxisSavingsFormat, processDescription } from './axisSavings';
