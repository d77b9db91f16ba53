/**
 * Error types surfaced to callers.
 *
 * Most degenerate inputs (empty domains, missing fields, malformed filters)
 * resolve to documented defaults instead of throwing. These classes cover
 * the cases that do throw.
 */

import type { Value } from './value.js';

/**
 * Base error with an optional hint and a multi-line `format()` output.
 */
export class PlotcoreError extends Error {
  readonly hint?: string;

  constructor(message: string, hint?: string) {
    super(message);
    this.name = 'PlotcoreError';
    this.hint = hint;
  }

  format(): string {
    const lines: string[] = [];
    lines.push(`error: ${this.message}`);
    lines.push(`  --> ${this.getExpression()}`);
    lines.push('   |');
    lines.push(`   └── ${this.getDetail()}`);

    if (this.hint) {
      lines.push('');
      lines.push(`help: ${this.hint}`);
    }

    return lines.join('\n');
  }

  protected getExpression(): string {
    return '(expression)';
  }

  protected getDetail(): string {
    return this.message;
  }
}

/**
 * A value could not be read as a number where one is required
 * (aggregate ops, bin, preset coordinates, continuous scale domains).
 */
export class CoercionError extends PlotcoreError {
  readonly field: string;
  readonly op: string;
  readonly value: Value | undefined;

  constructor(field: string, op: string, value: Value | undefined) {
    super(
      `cannot coerce field '${field}' to a number for '${op}'`,
      `drop or clean rows where '${field}' is not numeric before applying '${op}'`
    );
    this.name = 'CoercionError';
    this.field = field;
    this.op = op;
    this.value = value;
  }

  protected override getExpression(): string {
    return `${this.op}(${this.field})`;
  }

  protected override getDetail(): string {
    return `value ${JSON.stringify(this.value ?? null)} is not numeric`;
  }
}

/**
 * Raised by the strict filter parser. The transform pipeline never raises
 * it: an expression that does not parse keeps every row.
 */
export class FilterSyntaxError extends PlotcoreError {
  readonly expression: string;
  readonly problems: string[];

  constructor(expression: string, problems: string[]) {
    super(`invalid filter expression: ${problems.join(', ')}`, "expected '<field> <op> <value>' with op one of >=, <=, !=, ==, >, <");
    this.name = 'FilterSyntaxError';
    this.expression = expression;
    this.problems = problems;
  }

  protected override getExpression(): string {
    return this.expression;
  }
}
