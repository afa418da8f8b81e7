/**
 * TeXHandler - indentation-aware line buffer
 *
 * A handler collects logical lines. `write()` appends to the current logical
 * line, `newline()` ends it; an embedded `\n` is the same as a `newline()`.
 * Each logical line remembers the indentation level that was active when it
 * was started, so changing the indentation only affects lines written later.
 *
 * Wrapping happens when the handler is rendered: a logical line longer than
 * the wrap length is split after the last space that still fits, or hard at
 * the wrap length when there is no such space. Continuation lines are
 * indented by `hangingIndent` extra units. When the split happens inside a
 * TeX comment (after an unescaped `%`), every continuation starts with `% `
 * so the rest of the text stays commented out.
 */

import { TeXError, TeXValueError } from './errors.js';

export interface HandlerOptions {
  /** Indentation level of every line before any `pushIndent()` (default 0) */
  indentLevel?: number;
  /** Maximum width of a physical line, wrapping is off when unset or <= 0 */
  lineWrapLength?: number;
  /** Text of one indentation level (default a tab) */
  indentUnit?: string;
  /** Display width of a tab while measuring lines (default 4) */
  tabWidth?: number;
  /** Extra levels for wrapped continuation lines (default 1) */
  hangingIndent?: number;
}

/**
 * One line as written, before wrapping
 */
export interface LogicalLine {
  readonly indent: number;
  readonly text: string;
}

/**
 * One line as rendered, after wrapping
 */
export interface PhysicalLine {
  readonly indent: number;
  readonly text: string;
  readonly continuation: boolean;
}

const COMMENT_CONTINUATION = '% ';

function requireCount(value: number, what: string): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new TeXValueError(`${what} must be a non-negative integer, received ${value}`);
  }
}

/**
 * True if `text` contains a `%` that is not escaped as `\%`
 */
function opensComment(text: string): boolean {
  return /(^|[^\\])%/.test(text);
}

export class TeXHandler {
  private lines: LogicalLine[] = [];
  private pending: { indent: number; text: string } | null = null;
  private indentStack: number[] = [];

  readonly baseIndent: number;
  readonly lineWrapLength: number | undefined;
  readonly indentUnit: string;
  readonly tabWidth: number;
  readonly hangingIndent: number;

  constructor(options: HandlerOptions = {}) {
    const { indentLevel = 0, lineWrapLength, indentUnit = '\t', tabWidth = 4, hangingIndent = 1 } = options;
    requireCount(indentLevel, 'indentLevel');
    requireCount(tabWidth, 'tabWidth');
    requireCount(hangingIndent, 'hangingIndent');
    this.baseIndent = indentLevel;
    this.lineWrapLength = lineWrapLength !== undefined && lineWrapLength > 0 ? lineWrapLength : undefined;
    this.indentUnit = indentUnit;
    this.tabWidth = tabWidth;
    this.hangingIndent = hangingIndent;
  }

  /**
   * Indentation level applied to the next line that is started
   */
  get indentLevel(): number {
    return this.indentStack.reduce((sum, levels) => sum + levels, this.baseIndent);
  }

  /**
   * Number of logical lines, including an unfinished last line
   */
  get lineCount(): number {
    return this.lines.length + (this.pending ? 1 : 0);
  }

  get isEmpty(): boolean {
    return this.lineCount === 0;
  }

  /**
   * True when nothing has been written since the last line ended
   */
  get atLineStart(): boolean {
    return this.pending === null;
  }

  /**
   * Snapshot of all logical lines
   */
  get data(): readonly LogicalLine[] {
    return this.pending ? [...this.lines, { ...this.pending }] : [...this.lines];
  }

  pushIndent(levels: number = 1): void {
    requireCount(levels, 'Indentation levels');
    this.indentStack.push(levels);
  }

  popIndent(): void {
    if (this.indentStack.length === 0) {
      throw new TeXError('popIndent called without matching pushIndent');
    }
    this.indentStack.pop();
  }

  /**
   * Append `text` to the current logical line
   */
  write(text: string): void {
    const pieces = text.split(/\r?\n/);
    pieces.forEach((piece, index) => {
      if (index > 0) {
        this.endLine();
      }
      if (piece === '') return;
      if (!this.pending) {
        this.pending = { indent: this.indentLevel, text: '' };
      }
      this.pending.text += piece;
    });
  }

  /**
   * Write `text` and end the line
   */
  writeLine(text: string = ''): void {
    this.write(text);
    this.newline();
  }

  /**
   * End the current logical line if anything has been written to it
   */
  finishLine(): void {
    if (this.pending) {
      this.endLine();
    }
  }

  /**
   * End the current logical line `count` times; every call after the first
   * produces an empty line
   */
  newline(count: number = 1): void {
    requireCount(count, 'Newline count');
    for (let i = 0; i < count; i++) {
      this.endLine();
    }
  }

  /**
   * Copy every line of `other` into this handler, shifted by the current
   * indentation level. An unfinished line of this handler is ended first.
   */
  append(other: TeXHandler): void {
    if (other === this) {
      throw new TeXError('Cannot append a handler to itself');
    }
    this.finishLine();
    const shift = this.indentLevel;
    for (const line of other.data) {
      this.lines.push({ indent: line.indent + shift, text: line.text });
    }
  }

  /**
   * Read `size` logical lines starting at line `offset`; fewer lines are
   * returned when the handler ends earlier
   */
  readLines(offset: number = 0, size: number = 1): string[] {
    requireCount(offset, 'offset');
    requireCount(size, 'size');
    const data = this.data;
    if (offset > data.length) {
      throw new TeXValueError(`offset ${offset} is past the last line (${data.length} lines)`);
    }
    return data.slice(offset, offset + size).map((line) => line.text);
  }

  /**
   * Render all lines, wrapped according to `lineWrapLength`
   */
  physicalLines(): PhysicalLine[] {
    const result: PhysicalLine[] = [];
    for (const line of this.data) {
      result.push(...this.wrapLine(line));
    }
    return result;
  }

  toString(): string {
    return this.physicalLines()
      .map((line) => (line.text === '' ? '' : this.indentUnit.repeat(line.indent) + line.text))
      .join('\n');
  }

  private endLine(): void {
    this.lines.push(this.pending ?? { indent: this.indentLevel, text: '' });
    this.pending = null;
  }

  private unitWidth(): number {
    let width = 0;
    for (const ch of this.indentUnit) {
      width += ch === '\t' ? this.tabWidth : 1;
    }
    return width;
  }

  private wrapLine(line: LogicalLine): PhysicalLine[] {
    const wrapLength = this.lineWrapLength;
    if (wrapLength === undefined) {
      return [{ indent: line.indent, text: line.text, continuation: false }];
    }

    const result: PhysicalLine[] = [];
    const unitWidth = this.unitWidth();
    let indent = line.indent;
    let prefix = '';
    // measured in code points so a surrogate pair is never split
    let rest = Array.from(line.text);
    let continuation = false;

    for (;;) {
      const available = Math.max(1, wrapLength - indent * unitWidth - prefix.length);
      if (rest.length <= available) {
        result.push({ indent, text: prefix + rest.join(''), continuation });
        return result;
      }

      // break after the last space that fits, otherwise hard at the limit
      let breakAt = rest.lastIndexOf(' ', available - 1) + 1;
      if (breakAt <= 0 || rest.slice(0, breakAt).join('').trim() === '') {
        breakAt = available;
      }
      const left = rest.slice(0, breakAt).join('');
      result.push({ indent, text: prefix + left, continuation });

      if (!prefix && opensComment(left)) {
        prefix = COMMENT_CONTINUATION;
      }
      if (!continuation) {
        indent += this.hangingIndent;
        continuation = true;
      }
      rest = rest.slice(breakAt);
    }
  }
}
