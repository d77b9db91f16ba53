/**
 * Filter Prettifier
 *
 * Prints a parsed comparison back as canonical filter text. Literals that
 * are not plain numbers are single-quoted.
 */

import type { FilterExpression } from './ast.js';

const PLAIN_NUMBER = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export function formatFilter(expr: FilterExpression): string {
  const literal = PLAIN_NUMBER.test(expr.value) ? expr.value : `'${expr.value}'`;
  return `datum.${expr.field} ${expr.operator} ${literal}`;
}
