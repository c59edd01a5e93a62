/**
 * Formats list item markers: bullets and 1-based numbers.
 */

import type { ListType } from '../types/index.js';

/**
 * Filled dot drawn to the left of a bulleted item.
 */
export interface BulletDot {
  cx: number;
  cy: number;
  r: number;
}

/** Indent added before bulleted text, as a multiple of font size */
export const BULLET_INDENT = 1.2;

export class BulletFormatter {
  /**
   * Returns the item text with its list prefix ("N. " for numbered lists).
   *
   * @param index Zero-based item index
   */
  formatItem(type: ListType, index: number, content: string): string {
    if (type === 'number') {
      return `${index + 1}. ${content}`;
    }
    return content;
  }

  /**
   * Left offset applied to the whole list for its markers.
   */
  indent(type: ListType, fontSize: number): number {
    return type === 'bullet' ? fontSize * BULLET_INDENT : 0;
  }

  /**
   * Places the bullet dot for an item whose text starts at (`x`, `y`).
   * The dot has radius fs/4 and sits one font size to the left of the text,
   * a quarter font size above the baseline.
   */
  bulletDot(x: number, y: number, fontSize: number): BulletDot {
    const size = fontSize / 2;
    const r = size / 2;
    return { cx: x - size * 2, cy: y - r, r };
  }
}
