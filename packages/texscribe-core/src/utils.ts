/**
 * Small helpers that produce TeX snippets
 */

import { TeXValueError } from './errors.js';

/**
 * An exact fraction, written as `\frac{numerator}{denominator}` in math mode
 */
export interface Ratio {
  readonly numerator: number;
  readonly denominator: number;
}

/**
 * Values `texMathsString` knows how to format
 */
export type MathValue = string | number | bigint | boolean | Ratio | ReadonlySet<MathValue> | readonly MathValue[];

export function ratio(numerator: number, denominator: number): Ratio {
  if (!Number.isInteger(numerator) || !Number.isInteger(denominator)) {
    throw new TeXValueError(`A ratio needs integer parts, received ${numerator}/${denominator}`);
  }
  if (denominator === 0) {
    throw new TeXValueError('The denominator of a ratio cannot be 0');
  }
  return { numerator, denominator };
}

export function isRatio(value: unknown): value is Ratio {
  return (
    typeof value === 'object' &&
    value !== null &&
    'numerator' in value &&
    'denominator' in value &&
    typeof value.numerator === 'number' &&
    typeof value.denominator === 'number'
  );
}

function isSet(value: MathValue): value is ReadonlySet<MathValue> {
  return value instanceof Set;
}

function isList(value: MathValue): value is readonly MathValue[] {
  return Array.isArray(value);
}

/**
 * Vertical space of `length` (a TeX length like `2em`, or a number of points)
 */
export function vspace(length: string | number): string {
  return `\\vspace*{${length}}`;
}

export function parentheses(text: string): string {
  return `\\left( ${text} \\right)`;
}

export function brackets(text: string): string {
  return `\\left[ ${text} \\right]`;
}

export function braces(text: string): string {
  return `\\left\\{ ${text} \\right\\}`;
}

/**
 * Format a value for math mode.
 *
 * - ratios become `\frac{a}{b}`, with the sign in front
 * - sets are listed in braces
 * - arrays are listed in brackets; string elements are set as `\text{...}`
 * - everything else is converted with `String()`
 */
export function texMathsString(value: MathValue): string {
  if (isRatio(value)) {
    const negative = value.numerator * value.denominator < 0;
    return `${negative ? '-' : ''}\\frac{${Math.abs(value.numerator)}}{${Math.abs(value.denominator)}}`;
  }
  if (isSet(value)) {
    return braces([...value].map((element) => texMathsString(element)).join(', '));
  }
  if (isList(value)) {
    return brackets(
      value
        .map((element) => (typeof element === 'string' ? `\\text{${element}}` : texMathsString(element)))
        .join(', ')
    );
  }
  return String(value);
}
