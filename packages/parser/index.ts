/**
 * Filter Parser - Unified Entry Point
 *
 * Two ways in:
 * - `parseFilter` is strict and throws on anything that is not a comparison.
 * - `tryParseFilter` returns null instead; the transform pipeline uses it,
 *   since a malformed filter keeps every row rather than failing the chart.
 */

import { parseWithErrors } from './chevrotain-parser.js';
import { FilterSyntaxError } from '../data/errors.js';
import type { FilterExpression } from './ast.js';

/**
 * Parse a filter expression.
 *
 * @param input - Expression text, e.g. `datum.value > 10`
 * @returns The parsed comparison
 * @throws FilterSyntaxError when the text is not `<field> <op> <value>`
 */
export function parseFilter(input: string): FilterExpression {
  const result = parseWithErrors(input);
  if (result.ast) {
    return result.ast;
  }
  const problems = [
    ...result.lexErrors.map(e => e.message),
    ...result.parseErrors.map(e => e.message),
  ];
  throw new FilterSyntaxError(input, problems.length > 0 ? problems : ['missing field name']);
}

/**
 * Parse a filter expression, returning null when it does not parse.
 */
export function tryParseFilter(input: string): FilterExpression | null {
  return parseWithErrors(input).ast;
}

export { parseWithErrors };
export type { ParseResult } from './chevrotain-parser.js';

// Re-export types
export * from './ast.js';

// Re-export prettifier
export { formatFilter } from './prettifier.js';
