/**
 * braille-cell — the eight-dot braille cell as an immutable byte value.
 *
 * @example
 * ```typescript
 * import { BrailleCell, merge } from 'braille-cell'
 *
 * const d = BrailleCell.fromDots([1, 4, 5])
 * d.character                    // '⠙'
 * merge(d, BrailleCell.fromDots([8])).cellValue  // 153
 * ```
 */

export {
  BLANK_BRAILLE_CHARACTER,
  BrailleCell,
  DOT_NUMBERS,
  EMPTY_CELL,
  FULL_CELL,
  InvalidDotNumberError,
  UNICODE_BRAILLE_BASE,
  compare,
  flatten,
  isDotNumber,
  lowerDot,
  merge,
  raiseDot,
} from './utils/brailleCell';
export type { DotArray, DotNumber } from './utils/brailleCell';

export { brfTable, brfToCell, cellToBrf, parseCellCharacter } from './utils/braille';
