/**
 * Handler tests - line buffer, indentation and wrapping
 */

import { describe, it, expect } from 'vitest';
import { TeXHandler } from './handler.js';
import { TeXError, TeXValueError } from './errors.js';

describe('Handler - writing', () => {
  it('should append writes to the current line', () => {
    const handler = new TeXHandler();
    handler.write('a');
    handler.write('b');
    handler.newline();
    expect(handler.data).toEqual([{ indent: 0, text: 'ab' }]);
  });

  it('should count an unfinished line', () => {
    const handler = new TeXHandler();
    handler.write('pending');
    expect(handler.lineCount).toBe(1);
    expect(handler.toString()).toBe('pending');
  });

  it('should treat embedded newlines as hard breaks', () => {
    const handler = new TeXHandler();
    handler.write('x\ny');
    expect(handler.readLines(0, 2)).toEqual(['x', 'y']);
    expect(handler.lineCount).toBe(2);
  });

  it('should produce empty lines for repeated newlines', () => {
    const handler = new TeXHandler();
    handler.write('z');
    handler.newline(3);
    expect(handler.readLines(0, 10)).toEqual(['z', '', '']);
  });

  it('should ignore empty writes', () => {
    const handler = new TeXHandler();
    handler.write('');
    expect(handler.isEmpty).toBe(true);
  });

  it('should end a line only when it has text', () => {
    const handler = new TeXHandler();
    handler.finishLine();
    expect(handler.isEmpty).toBe(true);
    handler.write('a');
    handler.finishLine();
    handler.finishLine();
    expect(handler.lineCount).toBe(1);
  });

  it('should reject invalid newline counts', () => {
    const handler = new TeXHandler();
    expect(() => handler.newline(-1)).toThrow(TeXValueError);
    expect(() => handler.newline(1.5)).toThrow(TeXValueError);
  });
});

describe('Handler - indentation', () => {
  it('should apply indentation to lines started afterwards', () => {
    const handler = new TeXHandler();
    handler.write('a');
    handler.pushIndent();
    handler.write('b');
    handler.newline();
    handler.writeLine('c');
    handler.popIndent();
    handler.writeLine('d');
    expect(handler.data).toEqual([
      { indent: 0, text: 'ab' },
      { indent: 1, text: 'c' },
      { indent: 0, text: 'd' },
    ]);
  });

  it('should stack pushed levels', () => {
    const handler = new TeXHandler({ indentLevel: 1 });
    handler.pushIndent(2);
    handler.pushIndent();
    expect(handler.indentLevel).toBe(4);
    handler.popIndent();
    expect(handler.indentLevel).toBe(3);
  });

  it('should fail to pop past the base level', () => {
    const handler = new TeXHandler({ indentLevel: 2 });
    expect(() => handler.popIndent()).toThrow(TeXError);
  });

  it('should not indent empty lines', () => {
    const handler = new TeXHandler({ indentLevel: 1 });
    handler.writeLine('a');
    handler.newline();
    handler.writeLine('b');
    expect(handler.toString()).toBe('\ta\n\n\tb');
  });

  it('should use the configured indent unit', () => {
    const handler = new TeXHandler({ indentLevel: 2, indentUnit: '  ' });
    handler.writeLine('x');
    expect(handler.toString()).toBe('    x');
  });
});

describe('Handler - append', () => {
  it('should shift appended lines by the current indentation', () => {
    const parent = new TeXHandler({ indentLevel: 1 });
    const child = new TeXHandler();
    child.writeLine('x');
    child.pushIndent();
    child.write('y');
    parent.write('before');
    parent.append(child);
    expect(parent.data).toEqual([
      { indent: 1, text: 'before' },
      { indent: 1, text: 'x' },
      { indent: 2, text: 'y' },
    ]);
  });

  it('should leave the appended handler unchanged', () => {
    const parent = new TeXHandler();
    const child = new TeXHandler();
    child.writeLine('x');
    parent.append(child);
    parent.writeLine('y');
    expect(child.readLines(0, 5)).toEqual(['x']);
  });

  it('should refuse to append a handler to itself', () => {
    const handler = new TeXHandler();
    expect(() => handler.append(handler)).toThrow('Cannot append a handler to itself');
  });
});

describe('Handler - readLines', () => {
  const handler = new TeXHandler();
  handler.writeLine('a');
  handler.writeLine('b');
  handler.writeLine('c');

  it('should read a window of lines', () => {
    expect(handler.readLines(1, 5)).toEqual(['b', 'c']);
    expect(handler.readLines()).toEqual(['a']);
  });

  it('should read nothing at the end', () => {
    expect(handler.readLines(3)).toEqual([]);
  });

  it('should reject offsets past the end', () => {
    expect(() => handler.readLines(4)).toThrow(TeXValueError);
    expect(() => handler.readLines(-1)).toThrow(TeXValueError);
  });
});

describe('Handler - wrapping', () => {
  it('should hard-split text without spaces', () => {
    const handler = new TeXHandler({ lineWrapLength: 10 });
    handler.write('abcdefghijklmnop');
    expect(handler.physicalLines()).toEqual([
      { indent: 0, text: 'abcdefghij', continuation: false },
      { indent: 1, text: 'klmnop', continuation: true },
    ]);
    expect(handler.toString()).toBe('abcdefghij\n\tklmnop');
  });

  it('should reproduce the input when continuation indentation is stripped', () => {
    const inputs = ['abcdefghijklmnop', 'the quick brown fox jumps over the lazy dog', 'a bb ccc dddd eeeee ffffff'];
    for (const wrap of [6, 10, 17]) {
      for (const input of inputs) {
        const handler = new TeXHandler({ lineWrapLength: wrap, indentUnit: ' ', hangingIndent: 2 });
        handler.write(input);
        const lines = handler.physicalLines();
        for (const line of lines) {
          expect(line.indent + line.text.length).toBeLessThanOrEqual(wrap);
        }
        expect(lines.map((line) => line.text).join('')).toBe(input);
      }
    }
  });

  it('should count and split characters outside the basic plane whole', () => {
    const handler = new TeXHandler({ lineWrapLength: 10 });
    handler.writeLine('aaaaaaaaa\u{1F600}bc');
    handler.write('aaaaaaaaaa\u{1F600}');
    expect(handler.physicalLines()).toEqual([
      { indent: 0, text: 'aaaaaaaaa\u{1F600}', continuation: false },
      { indent: 1, text: 'bc', continuation: true },
      { indent: 0, text: 'aaaaaaaaaa', continuation: false },
      { indent: 1, text: '\u{1F600}', continuation: true },
    ]);
  });

  it('should break after the last space that fits', () => {
    const handler = new TeXHandler({ lineWrapLength: 10 });
    handler.write('the quick brown fox');
    expect(handler.physicalLines().map((line) => line.text)).toEqual(['the quick ', 'brown ', 'fox']);
  });

  it('should apply the hanging indent once', () => {
    const handler = new TeXHandler({ lineWrapLength: 10 });
    handler.write('the quick brown fox');
    expect(handler.physicalLines().map((line) => line.indent)).toEqual([0, 1, 1]);
  });

  it('should keep wrapped comments commented', () => {
    const handler = new TeXHandler({ lineWrapLength: 10, hangingIndent: 0 });
    handler.write('x % abc def ghi');
    expect(handler.toString()).toBe('x % abc \n% def ghi');
  });

  it('should not treat an escaped percent sign as a comment', () => {
    const handler = new TeXHandler({ lineWrapLength: 8, hangingIndent: 0 });
    handler.write('50\\% of all');
    expect(handler.toString()).toBe('50\\% of \nall');
  });

  it('should not wrap when the wrap length is not positive', () => {
    const handler = new TeXHandler({ lineWrapLength: 0 });
    handler.write('abcdefghijklmnop');
    expect(handler.lineWrapLength).toBeUndefined();
    expect(handler.toString()).toBe('abcdefghijklmnop');
  });

  it('should wrap without changing the logical lines', () => {
    const handler = new TeXHandler({ lineWrapLength: 4 });
    handler.writeLine('abcdefgh');
    expect(handler.data).toEqual([{ indent: 0, text: 'abcdefgh' }]);
  });
});
