/**
 * Arrow head types of directed paths, mapped to their TikZ option
 */
export enum TikZArrow {
  LINE = '-',

  LEFT = '<-',
  RIGHT = '->',
  LEFT_RIGHT = '<->',
  IN_LEFT = '>-',
  IN_RIGHT = '-<',
  IN_LEFT_RIGHT = '>-<',

  LEFT_STUMP = '|-',
  RIGHT_STUMP = '-|',
  LEFT_RIGHT_STUMP = '|-|',

  LEFT_LATEX = 'latex-',
  RIGHT_LATEX = '-latex',
  LEFT_RIGHT_LATEX = 'latex-latex',
  LEFT_LATEX_PRIME = "latex'-",
  RIGHT_LATEX_PRIME = "-latex'",
  LEFT_RIGHT_LATEX_PRIME = "latex'-latex'",

  LEFT_CIRC = 'o-',
  RIGHT_CIRC = '-o',
  LEFT_RIGHT_CIRC = 'o-o',
}

export const TIKZ_ARROWS: readonly TikZArrow[] = Object.values(TikZArrow);

/**
 * Look up an arrow by its enum name (`RIGHT`) or its TikZ option (`->`)
 */
export function parseArrow(text: string): TikZArrow | undefined {
  for (const [name, arrow] of Object.entries(TikZArrow)) {
    if (name === text || arrow === text) {
      return arrow;
    }
  }
  return undefined;
}
