/**
 * Filter transform - keeps rows matching a single comparison.
 *
 * Comparison rules:
 * - both sides numeric: numeric comparison (equality within Number.EPSILON)
 * - otherwise: case-insensitive text comparison
 * - field absent from the row: row excluded
 * - expression does not parse: every row kept
 */

import { asNumber, asText, compareText, hasField } from '../data/value.js';
import type { Row, Value } from '../data/value.js';
import { tryParseFilter } from '../parser/index.js';
import type { ComparisonExpression, ComparisonOperator } from '../parser/index.js';

export type RowPredicate = (row: Row) => boolean;

function compareNumbers(a: number, b: number, op: ComparisonOperator): boolean {
  switch (op) {
    case '==':
      return Math.abs(a - b) < Number.EPSILON;
    case '!=':
      return Math.abs(a - b) >= Number.EPSILON;
    case '>':
      return a > b;
    case '>=':
      return a >= b;
    case '<':
      return a < b;
    case '<=':
      return a <= b;
  }
}

function compareTexts(a: string, b: string, op: ComparisonOperator): boolean {
  const order = compareText(a, b);
  switch (op) {
    case '==':
      return order === 0;
    case '!=':
      return order !== 0;
    case '>':
      return order > 0;
    case '>=':
      return order >= 0;
    case '<':
      return order < 0;
    case '<=':
      return order <= 0;
  }
}

/**
 * Build a row predicate from a parsed comparison. The literal is
 * converted to a number once, not per row.
 */
export function predicateFor(expr: ComparisonExpression): RowPredicate {
  const literalNumber = asNumber(expr.value);

  return (row: Row): boolean => {
    if (!hasField(row, expr.field)) {
      return false;
    }
    const fieldValue: Value = row[expr.field];
    const fieldNumber = asNumber(fieldValue);
    if (fieldNumber !== null && literalNumber !== null) {
      return compareNumbers(fieldNumber, literalNumber, expr.operator);
    }
    return compareTexts(asText(fieldValue), expr.value, expr.operator);
  };
}

/**
 * Compile a filter expression into a predicate.
 */
export function compileFilter(expression: string): RowPredicate {
  const expr = tryParseFilter(expression);
  if (!expr) {
    if (process.env.DEBUG_TRANSFORMS === 'true') {
      console.log(`  filter "${expression}" did not parse; keeping all rows`);
    }
    return () => true;
  }
  return predicateFor(expr);
}

/**
 * Keep the rows matching `expression`, in their original order.
 */
export function filterRows(rows: readonly Row[], expression: string): Row[] {
  const predicate = compileFilter(expression);
  return rows.filter(predicate);
}
