/**
 * Color tests
 */

import { describe, it, expect } from 'vitest';
import { TeXValueError } from 'texscribe-core';
import { TikZColor } from './color.js';

describe('TikZColor - definition', () => {
  it('should define RGB colors without alpha', () => {
    expect(TikZColor.WHITE.definition).toBe('\\definecolor{WHITE}{RGB}{255, 255, 255}');
  });

  it('should write the alpha channel as a percentage', () => {
    expect(TikZColor.WHITE.xcolorName).toBe('WHITE!100');
    expect(new TikZColor('half', [0, 0, 0, 128], 'RGB').xcolorName).toBe('half!50');
    expect(new TikZColor('third', [0.5, 0.25, 0, 0.3]).toString()).toBe('third!30');
  });

  it('should use the plain name without alpha', () => {
    const color = new TikZColor('c', [0.5, 0.25, 0]);
    expect(color.definition).toBe('\\definecolor{c}{rgb}{0.5, 0.25, 0}');
    expect(color.xcolorName).toBe('c');
    expect(color.alpha).toBeUndefined();
  });

  it('should need xcolor', () => {
    expect(TikZColor.RED.requiredPackages).toEqual(['xcolor']);
  });

  it('should provide sixteen default colors', () => {
    expect(TikZColor.DEFAULT_COLORS).toHaveLength(16);
    expect(TikZColor.DEFAULT_COLORS[0].name).toBe('WHITE');
    expect(TikZColor.DEFAULT_COLORS[15].name).toBe('ROSE');
    expect(TikZColor.YELLOW.value).toEqual([251, 219, 4, 255]);
  });
});

describe('TikZColor - validation', () => {
  it('should reject channels outside the range of the mode', () => {
    expect(() => new TikZColor('c', [256, 0, 0], 'RGB')).toThrow(TeXValueError);
    expect(() => new TikZColor('c', [1.5, 0, 0], 'RGB')).toThrow(TeXValueError);
    expect(() => new TikZColor('c', [1.5, 0, 0])).toThrow(TeXValueError);
    expect(() => new TikZColor('c', [-0.1, 0, 0])).toThrow(TeXValueError);
  });

  it('should reject the wrong number of channels', () => {
    expect(() => new TikZColor('c', [0, 0])).toThrow('A color needs 3 or 4 channels, received 2');
  });

  it('should reject malformed names', () => {
    expect(() => new TikZColor('two words', [0, 0, 0])).toThrow(TeXValueError);
    expect(() => new TikZColor('a!b', [0, 0, 0])).toThrow(TeXValueError);
  });
});

describe('TikZColor - derived colors', () => {
  it('should add and remove alpha without changing the original', () => {
    const color = new TikZColor('c', [0.5, 0.25, 0]);
    const translucent = color.addAlpha(0.3);
    expect(translucent.xcolorName).toBe('c!30');
    expect(color.alpha).toBeUndefined();
    expect(translucent.removeAlpha().value).toEqual([0.5, 0.25, 0]);
    expect(color.removeAlpha()).toBe(color);
    expect(translucent.addAlpha(0.9)).toBe(translucent);
  });

  it('should clamp arithmetic to the range of the mode', () => {
    const base = new TikZColor('base', [100, 200, 250], 'RGB');
    expect(base.add(10).value).toEqual([110, 210, 255]);
    expect(base.subtract(150).value).toEqual([0, 50, 100]);
    expect(new TikZColor('x', [0.5, 0.5, 0.5]).multiply(3).value).toEqual([1, 1, 1]);
  });

  it('should truncate RGB results to integers', () => {
    const color = new TikZColor('odd', [101, 51, 0], 'RGB');
    expect(color.divide(2).value).toEqual([50, 25, 0]);
  });

  it('should apply per-channel operands', () => {
    const color = new TikZColor('c', [10, 10, 10], 'RGB');
    expect(color.add([1, 2, 3]).value).toEqual([11, 12, 13]);
    expect(color.add(new TikZColor('d', [5, 5, 5], 'RGB')).value).toEqual([15, 15, 15]);
  });

  it('should generate names for results of plain operands', () => {
    const base = new TikZColor('base', [100, 200, 250], 'RGB');
    const lighter = base.add(10);
    expect(lighter.name.startsWith('base_')).toBe(true);
    expect(lighter.generateUniqueName).toBe(true);
    expect(base.add(10).name).toBe(lighter.name);
    expect(base.add(20).name).not.toBe(lighter.name);
    expect(lighter.add(5).name.startsWith('base_')).toBe(true);
  });

  it('should keep the name when combining two plain colors', () => {
    const sum = new TikZColor('a', [1, 1, 1], 'RGB').add(new TikZColor('b', [2, 2, 2], 'RGB'));
    expect(sum.name).toBe('a');
  });

  it('should reject invalid operands', () => {
    const color = new TikZColor('c', [10, 10, 10], 'RGB');
    expect(() => color.add(-1)).toThrow(TeXValueError);
    expect(() => color.add([1, 2])).toThrow(TeXValueError);
    expect(() => color.divide(0)).toThrow(TeXValueError);
  });

  it('should compare by name', () => {
    expect(new TikZColor('same', [0, 0, 0]).equals(new TikZColor('same', [1, 1, 1]))).toBe(true);
    expect(TikZColor.RED.equals(TikZColor.ROSE)).toBe(false);
  });
});
