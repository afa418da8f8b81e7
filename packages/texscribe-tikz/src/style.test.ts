import { describe, it, expect } from 'vitest';
import { TeXValueError } from 'texscribe-core';
import { TikZColor } from './color.js';
import { TikZStyle, normalizeStyleKey } from './style.js';

describe('normalizeStyleKey', () => {
  it('should accept every spelling of a key', () => {
    expect(normalizeStyleKey('lineWidth')).toBe('line width');
    expect(normalizeStyleKey('line_width')).toBe('line width');
    expect(normalizeStyleKey('line-width')).toBe('line width');
    expect(normalizeStyleKey('xScale')).toBe('x scale');
    expect(normalizeStyleKey('Loop  Above')).toBe('loop above');
  });
});

describe('TikZStyle', () => {
  it('should write flags before other entries', () => {
    expect(new TikZStyle({ width: '1cm', draw: true }).toString()).toBe('draw, width={1cm}');
  });

  it('should write an empty style as an empty string', () => {
    const style = new TikZStyle();
    expect(style.toString()).toBe('');
    expect(style.isEmpty).toBe(true);
  });

  it('should keep false flags without writing them', () => {
    const style = new TikZStyle({ dashed: false });
    expect(style.toString()).toBe('');
    expect(style.size).toBe(1);
    expect(style.isEmpty).toBe(false);
  });

  it('should write shifts as coordinates', () => {
    expect(new TikZStyle({ shift: [1, '2cm'] }).toString()).toBe('shift={(1, 2cm)}');
  });

  it('should write colors by their xcolor name and list each once', () => {
    const style = new TikZStyle({ color: TikZColor.RED, fill: TikZColor.RED });
    expect(style.toString()).toBe('color={RED!100}, fill={RED!100}');
    expect(style.colors).toEqual([TikZColor.RED]);
  });

  it('should write custom entries after typed ones', () => {
    const style = new TikZStyle({ circle: true }, { 'loop above': true, minimumSize: '1cm' });
    expect(style.toString()).toBe('circle, loop above, minimum size={1cm}');
    expect(style.keys()).toEqual(['circle', 'loop above', 'minimum size']);
  });

  it('should reject unknown custom keys when strict', () => {
    expect(() => new TikZStyle({}, { 'loop above': true }, true)).toThrow("Unknown style key 'loop above'");
    expect(new TikZStyle({}, { line_width: '1mm' }, true).toString()).toBe('line width={1mm}');
  });

  it('should validate opacities and numbers', () => {
    expect(() => new TikZStyle({ drawOpacity: 1.5 })).toThrow(TeXValueError);
    expect(() => new TikZStyle({}, { opacity: 2 })).toThrow(TeXValueError);
    expect(() => new TikZStyle({ scale: Number.NaN })).toThrow(TeXValueError);
    expect(new TikZStyle({ fillOpacity: 0.5 }).toString()).toBe('fill opacity={0.5}');
  });

  it('should look entries up by any spelling', () => {
    const style = new TikZStyle({ lineWidth: '2mm', xScale: 2 });
    expect(style.get('line-width')).toBe('2mm');
    expect(style.has('x_scale')).toBe(true);
    expect(style.has('y scale')).toBe(false);
  });

  it('should merge into a new style where the argument wins', () => {
    const a = new TikZStyle({ width: '1cm', dashed: true });
    const b = new TikZStyle({ width: '2cm', dotted: true });
    expect(a.merge(b).toString()).toBe('dashed, dotted, width={2cm}');
    expect(a.toString()).toBe('dashed, width={1cm}');
    expect(b.toString()).toBe('dotted, width={2cm}');
  });

  it('should compare entries', () => {
    expect(new TikZStyle({ width: '1cm' }).equals(new TikZStyle({}, { width: '1cm' }))).toBe(true);
    expect(new TikZStyle().equals(new TikZStyle())).toBe(true);
    expect(new TikZStyle({ width: 1 }).equals(new TikZStyle({ width: '1' }))).toBe(false);
    expect(new TikZStyle({ width: '1cm' }).equals(new TikZStyle({ height: '1cm' }))).toBe(false);
  });
});
