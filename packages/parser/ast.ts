/**
 * Filter Expression AST
 *
 * A filter is a single comparison: `<field> <op> <value>`. The expression is
 * parsed once per transform; rows are then tested against the parsed form.
 */

/**
 * Comparison operators, in the order an expression is matched against them
 * (two-character operators before their one-character prefixes).
 */
export const COMPARISON_OPERATORS = ['>=', '<=', '!=', '==', '>', '<'] as const;

export type ComparisonOperator = (typeof COMPARISON_OPERATORS)[number];

export interface ComparisonExpression {
  type: 'comparison';
  /** Field name with any `datum.` qualifier removed */
  field: string;
  operator: ComparisonOperator;
  /** Literal text with surrounding quotes removed; may be empty */
  value: string;
}

export type FilterExpression = ComparisonExpression;

export function isComparisonOperator(text: string): text is ComparisonOperator {
  return (COMPARISON_OPERATORS as readonly string[]).includes(text);
}
