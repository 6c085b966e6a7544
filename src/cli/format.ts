import type { OutputFormat } from '../config';
import { UNICODE_BRAILLE_BASE, type BrailleCell, type DotNumber } from '../utils/brailleCell';
import { cellToBrf } from '../utils/braille';

export interface CellDescription {
  character: string;
  dots: DotNumber[];
  value: number;
  codePoint: string;
  brf: string | null;
}

export function describeCell(cell: BrailleCell): CellDescription {
  const codePoint = (UNICODE_BRAILLE_BASE + cell.cellValue).toString(16).toUpperCase();
  return {
    character: cell.character,
    dots: cell.raisedDots(),
    value: cell.cellValue,
    codePoint: `U+${codePoint}`,
    brf: cellToBrf(cell),
  };
}

function brfLabel(brf: string | null): string {
  if (brf === null) return '-';
  return brf === ' ' ? '[Space]' : brf;
}

/**
 * One line per cell, e.g.
 *   ⠙  dots 1-4-5  value 25 (0x19)  U+2819  brf D
 */
export function formatCell(cell: BrailleCell, format: OutputFormat): string {
  const description = describeCell(cell);
  if (format === 'json') {
    return JSON.stringify(description);
  }

  const dots = description.dots.length > 0 ? description.dots.join('-') : 'none';
  const hex = description.value.toString(16).padStart(2, '0');
  return [
    description.character,
    `dots ${dots}`,
    `value ${description.value} (0x${hex})`,
    description.codePoint,
    `brf ${brfLabel(description.brf)}`,
  ].join('  ');
}
