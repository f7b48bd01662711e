/**
 * Slice-to-fit policy for sources longer than the requested width.
 */

import { Alignment } from '../types/pad.js';
import type { TruncationWindow } from '../types/pad.js';

/**
 * Computes the contiguous window of `width` elements kept from a source of
 * `length` elements.
 *
 * - Left keeps the prefix
 * - Right keeps the suffix
 * - Center keeps the middle; an odd width keeps the extra element on the
 *   trailing side
 *
 * Requires `0 <= width <= length`. The window length always equals `width`.
 */
export function truncationWindow(length: number, width: number, alignment: Alignment): TruncationWindow {
  switch (alignment) {
    case Alignment.Left:
      return { start: 0, end: width };
    case Alignment.Right:
      return { start: length - width, end: length };
    case Alignment.Center: {
      const middle = Math.floor(length / 2);
      const half = Math.floor(width / 2);
      return { start: middle - half, end: middle + half + (width % 2) };
    }
  }
}
