/**
 * Exercise Line Parser
 *
 * Turns one log line ("Bench press 10k: 4, 4x5") into the exercise name and
 * the set expression tree the evaluator consumes.
 *
 * Notation:
 *   4            one set of 4 reps
 *   4x5          4 sets of 5 reps
 *   4x5x75k      4 sets of 5 reps at 75
 *   15xx40k,50k  15 reps at each listed weight
 *   75k: ...     75 is the weight of everything after the colon
 *   75k          one rep at 75
 *
 * Terms are joined by commas. A weight scope runs to the end of the line.
 */

import type { ParsedExerciseLine, SetExpressionNode, Weight, WeightUnit } from '../../../../shared/types';
import { DEFAULT_WEIGHT_UNIT, UNIT_MARKERS } from '../../../../shared/constants';
import { SetLogSyntaxError } from './errors';

// ============================================================================
// Tokens
// ============================================================================

type Token =
  | { type: 'number'; value: number; text: string; marked: boolean; column: number }
  | { type: 'times'; column: number }
  | { type: 'multi'; column: number }
  | { type: 'comma'; column: number }
  | { type: 'colon'; column: number };

type NumberToken = Extract<Token, { type: 'number' }>;

export interface LineParserOptions {
  unit?: WeightUnit;
  lineNumber?: number;
}

const NUMBER_PATTERN = /^\d+(?:\.\d+)?/;
const MARKER_PATTERN = /^[a-z]+/i;

/**
 * Split the set notation into tokens
 *
 * @param text - Everything after the exercise name
 * @param offset - Column of text[0] in the original line, for error messages
 */
export function tokenize(text: string, unit: WeightUnit, offset = 0): Token[] {
  const tokens: Token[] = [];
  const markers = UNIT_MARKERS[unit];
  let index = 0;

  while (index < text.length) {
    const char = text[index];
    const column = offset + index + 1;

    if (/\s/.test(char)) {
      index++;
      continue;
    }

    if (char === ',') {
      tokens.push({ type: 'comma', column });
      index++;
      continue;
    }

    if (char === ':') {
      tokens.push({ type: 'colon', column });
      index++;
      continue;
    }

    if (char === 'x' || char === 'X') {
      const next = text[index + 1];
      if (next === 'x' || next === 'X') {
        tokens.push({ type: 'multi', column });
        index += 2;
      } else {
        tokens.push({ type: 'times', column });
        index++;
      }
      continue;
    }

    const numberMatch = NUMBER_PATTERN.exec(text.slice(index));
    if (numberMatch) {
      const numberText = numberMatch[0];
      index += numberText.length;

      let marked = false;
      const markerMatch = MARKER_PATTERN.exec(text.slice(index));
      // "4x5" reads as 4, x, 5: only a known marker attaches to the number
      if (markerMatch && !/^x/i.test(markerMatch[0])) {
        const marker = markerMatch[0].toLowerCase();
        if (!markers.includes(marker)) {
          throw new SetLogSyntaxError(
            `Unknown weight unit "${markerMatch[0]}" (expected ${markers.join(' or ')})`,
            offset + index + 1
          );
        }
        marked = true;
        index += marker.length;
      }

      tokens.push({ type: 'number', value: Number(numberText), text: numberText, marked, column });
      continue;
    }

    throw new SetLogSyntaxError(`Unexpected character "${char}"`, column);
  }

  return tokens;
}

// ============================================================================
// Parser
// ============================================================================

class NotationParser {
  private position = 0;

  constructor(
    private readonly tokens: Token[],
    private readonly unit: WeightUnit,
    private readonly endColumn: number
  ) {}

  parse(): SetExpressionNode {
    if (this.tokens.length === 0) {
      throw new SetLogSyntaxError('Missing set notation', this.endColumn);
    }
    const root = this.parseExpression();
    const trailing = this.peek();
    if (trailing) {
      throw new SetLogSyntaxError(`Unexpected ${describe(trailing)}`, trailing.column);
    }
    return root;
  }

  private parseExpression(): SetExpressionNode {
    let node = this.parseTerm();
    while (this.peek()?.type === 'comma') {
      this.position++;
      node = { kind: 'combine', left: node, right: this.parseTerm() };
    }
    return node;
  }

  private parseTerm(): SetExpressionNode {
    const first = this.expectNumber();
    const next = this.peek();

    if (next?.type === 'colon') {
      this.position++;
      return { kind: 'weightScoped', weight: this.toWeight(first), inner: this.parseExpression() };
    }

    if (first.marked) {
      // "100k 5": the colon may be left out after a marked weight
      if (next?.type === 'number') {
        return { kind: 'weightScoped', weight: this.toWeight(first), inner: this.parseExpression() };
      }
      return { kind: 'weightScoped', weight: this.toWeight(first) };
    }

    if (next?.type === 'multi') {
      this.position++;
      return this.parseMultiWeight(first);
    }

    if (next?.type === 'times') {
      this.position++;
      const repetitions = this.expectNumber();
      this.rejectMarked(repetitions);

      if (this.peek()?.type === 'times') {
        this.position++;
        const weight = this.expectNumber();
        return {
          kind: 'wholeSet',
          sets: first.value,
          repetitions: repetitions.value,
          weight: this.toWeight(weight),
        };
      }

      return { kind: 'countByCount', sets: first.value, repetitions: repetitions.value };
    }

    return { kind: 'bareCount', repetitions: first.value };
  }

  private parseMultiWeight(repetitions: NumberToken): SetExpressionNode {
    const weights: Weight[] = [this.toWeight(this.expectNumber())];

    // The list continues while a comma is followed by a marked weight that
    // does not open a scope of its own
    while (this.peek()?.type === 'comma') {
      const candidate = this.peek(1);
      const afterCandidate = this.peek(2);
      if (candidate?.type !== 'number' || !candidate.marked || afterCandidate?.type === 'colon') {
        break;
      }
      this.position += 2;
      weights.push(this.toWeight(candidate));
    }

    return { kind: 'fixedRepsMultiWeight', repetitions: repetitions.value, weights };
  }

  private expectNumber(): NumberToken {
    const token = this.peek();
    if (!token) {
      throw new SetLogSyntaxError('Expected a number', this.endColumn);
    }
    if (token.type !== 'number') {
      throw new SetLogSyntaxError(`Expected a number but found ${describe(token)}`, token.column);
    }
    this.position++;
    return token;
  }

  private rejectMarked(token: NumberToken): void {
    if (token.marked) {
      throw new SetLogSyntaxError(`"${token.text}" is a repetition count and cannot carry a unit`, token.column);
    }
  }

  private toWeight(token: NumberToken): Weight {
    return { amount: token.value, unit: this.unit };
  }

  private peek(ahead = 0): Token | undefined {
    return this.tokens[this.position + ahead];
  }
}

function describe(token: Token): string {
  switch (token.type) {
    case 'number':
      return `"${token.text}"`;
    case 'times':
      return '"x"';
    case 'multi':
      return '"xx"';
    case 'comma':
      return '","';
    case 'colon':
      return '":"';
  }
}

/**
 * Column where the notation starts: the first digit or colon that begins a word
 */
function findNotationStart(line: string): number {
  const match = /(^|\s)[\d:]|:/.exec(line);
  if (!match) {
    return -1;
  }
  // A two-character match is the whitespace before the digit
  return match[0].length > 1 ? match.index + 1 : match.index;
}

/**
 * Parse one exercise line
 *
 * @throws SetLogSyntaxError when the name or the notation is missing or malformed
 */
export function parseExerciseLine(source: string, options: LineParserOptions = {}): ParsedExerciseLine {
  const unit = options.unit ?? DEFAULT_WEIGHT_UNIT;
  const lineNumber = options.lineNumber ?? 1;

  const start = findNotationStart(source);
  const rawName = start === -1 ? source : source.slice(0, start);
  const name = rawName.trim();

  if (name.length === 0) {
    throw new SetLogSyntaxError('Missing exercise name', 1);
  }

  const notation = start === -1 ? '' : source.slice(start);
  let tokens = tokenize(notation, unit, start === -1 ? source.length : start);

  // "Squat: 3x5x100k" - a colon straight after the name only separates it
  if (tokens[0]?.type === 'colon') {
    tokens = tokens.slice(1);
  }

  const root = new NotationParser(tokens, unit, source.length + 1).parse();

  return { name, root, lineNumber, source };
}
