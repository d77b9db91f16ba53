/**
 * Filter Parser using Chevrotain
 *
 * The grammar is deliberately loose: some text, an operator, then any text.
 * When several operators occur, the split happens at the first occurrence
 * of the operator that comes earliest in `>=, <=, !=, ==, >, <`, so
 * `a < b >= 3` compares field `a < b` with `3`. Field and literal text are
 * sliced from the source around that operator so that inner spacing
 * survives (e.g. `city == New York`).
 */

import {
  createToken,
  EmbeddedActionsParser,
  ILexingError,
  IRecognitionException,
  IToken,
  Lexer,
} from 'chevrotain';
import { COMPARISON_OPERATORS, ComparisonExpression, isComparisonOperator } from './ast.js';

// ---
// TOKEN DEFINITIONS
// ---

const WhiteSpace = createToken({
  name: 'WhiteSpace',
  pattern: /\s+/,
  group: Lexer.SKIPPED,
});

// Longer operators first so `>=` never lexes as `>` followed by `=`
const ComparisonOp = createToken({ name: 'ComparisonOp', pattern: />=|<=|!=|==|>|</ });

// Any run of characters that cannot start an operator (includes quotes and dots)
const Word = createToken({ name: 'Word', pattern: /[^\s<>=!]+/ });

// A lone `=` or `!` that is not part of an operator
const Stray = createToken({ name: 'Stray', pattern: /[=!]/ });

// Token order matters! Operators before the catch-alls
const allTokens = [WhiteSpace, ComparisonOp, Word, Stray];

const FilterLexer = new Lexer(allTokens);

// ---
// PARSER
// ---

interface ComparisonParts {
  fieldTokens: IToken[];
  operator: IToken;
  valueTokens: IToken[];
}

class FilterParser extends EmbeddedActionsParser {
  constructor() {
    super(allTokens);
    this.performSelfAnalysis();
  }

  // comparison = fieldPart ComparisonOp valuePart
  public comparison = this.RULE('comparison', (): ComparisonParts => {
    const fieldTokens: IToken[] = [];
    this.AT_LEAST_ONE(() => {
      fieldTokens.push(this.SUBRULE(this.fieldPart));
    });

    const operator = this.CONSUME(ComparisonOp);

    // Later operators are kept here; toAst decides where to split
    const valueTokens: IToken[] = [];
    this.MANY(() => {
      valueTokens.push(this.SUBRULE(this.valuePart));
    });

    return { fieldTokens, operator, valueTokens };
  });

  private fieldPart = this.RULE('fieldPart', (): IToken => {
    return this.OR([
      { ALT: () => this.CONSUME(Word) },
      { ALT: () => this.CONSUME(Stray) },
    ]);
  });

  private valuePart = this.RULE('valuePart', (): IToken => {
    return this.OR([
      { ALT: () => this.CONSUME(Word) },
      { ALT: () => this.CONSUME(Stray) },
      { ALT: () => this.CONSUME(ComparisonOp) },
    ]);
  });
}

const parserInstance = new FilterParser();

// ---
// AST CONSTRUCTION
// ---

const QUALIFIER = 'datum.';

function stripQualifier(field: string): string {
  return field.startsWith(QUALIFIER) ? field.slice(QUALIFIER.length) : field;
}

function trimQuotes(text: string): string {
  return text.replace(/^["']+|["']+$/g, '');
}

function splitOperator(parts: ComparisonParts): IToken {
  const tokens = [...parts.fieldTokens, parts.operator, ...parts.valueTokens];
  for (const op of COMPARISON_OPERATORS) {
    const match = tokens.find(t => t.tokenType === ComparisonOp && t.image === op);
    if (match) return match;
  }
  return parts.operator;
}

function toAst(input: string, parts: ComparisonParts): ComparisonExpression | null {
  const split = splitOperator(parts);
  const operator = split.image;
  if (!isComparisonOperator(operator)) {
    return null;
  }
  const field = stripQualifier(input.slice(0, split.startOffset).trim()).trim();
  if (field.length === 0) {
    return null;
  }
  const value = trimQuotes(input.slice(split.startOffset + operator.length).trim());
  return { type: 'comparison', field, operator, value };
}

// ---
// PUBLIC API
// ---

export interface ParseResult {
  ast: ComparisonExpression | null;
  lexErrors: ILexingError[];
  parseErrors: IRecognitionException[];
}

/**
 * Parse with full result including errors. `ast` is null whenever
 * the input is not a single `<field> <op> <value>` comparison.
 */
export function parseWithErrors(input: string): ParseResult {
  const lexResult = FilterLexer.tokenize(input);

  parserInstance.input = lexResult.tokens;
  const parts = parserInstance.comparison();
  const parseErrors = parserInstance.errors;

  let ast: ComparisonExpression | null = null;
  if (parseErrors.length === 0 && lexResult.errors.length === 0) {
    ast = toAst(input, parts);
  }

  return {
    ast,
    lexErrors: lexResult.errors,
    parseErrors,
  };
}

