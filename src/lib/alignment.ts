import { Alignment } from '../types/pad.js';
import type { PaddingSplit } from '../types/pad.js';

/**
 * Splits a size difference into leading and trailing fill counts.
 *
 * Center puts the smaller half first; an odd remainder goes to the trailing
 * side. `leading + trailing === diff` always holds.
 *
 * @param diff - Non-negative difference between target width and source length
 * @param alignment - Where the source sits inside the output
 */
export function splitPadding(diff: number, alignment: Alignment): PaddingSplit {
  switch (alignment) {
    case Alignment.Left:
      return { leading: 0, trailing: diff };
    case Alignment.Right:
      return { leading: diff, trailing: 0 };
    case Alignment.Center: {
      const leading = Math.floor(diff / 2);
      return { leading, trailing: diff - leading };
    }
  }
}
