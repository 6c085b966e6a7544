import { InvalidArgumentError } from 'commander';
import { BrailleCell, EMPTY_CELL } from '../utils/brailleCell';
import { parseCellCharacter } from '../utils/braille';

const DOT_LIST = /^[0-9]+$/;
const INTEGER = /^(0x[0-9a-f]+|0b[01]+|[0-9]+)$/i;

/**
 * Reads a dot list such as "145", "1-4-5" or "1,4,5". "none" is the empty cell.
 *
 * A digit outside 1-8 surfaces as an InvalidDotNumberError from
 * BrailleCell.fromDots; anything that is not a digit is a usage error.
 */
export function parseDotList(list: string): BrailleCell {
  const trimmed = list.trim();
  if (trimmed.toLowerCase() === 'none') return EMPTY_CELL;

  const digits = trimmed.replace(/[-,]/g, '');
  if (!DOT_LIST.test(digits)) {
    throw new InvalidArgumentError(
      `Invalid dot list "${list}": use digits 1-8, e.g. 145 or 1-4-5.`
    );
  }
  return BrailleCell.fromDots(Array.from(digits, Number));
}

/**
 * Decimal, 0x hex or 0b binary; truncated to eight bits like fromValue.
 * Read as a bigint so the low byte survives values past 2^53.
 */
export function parseCellValue(text: string): BrailleCell {
  const trimmed = text.trim();
  if (!INTEGER.test(trimmed)) {
    throw new InvalidArgumentError(
      `Invalid value "${text}": expected a decimal, 0x hex or 0b binary integer.`
    );
  }
  return BrailleCell.fromValue(Number(BigInt(trimmed) & 0xffn));
}

export function parseCharacter(text: string): BrailleCell {
  const cell = parseCellCharacter(text);
  if (cell === null) {
    throw new InvalidArgumentError(
      `"${text}" is neither a Unicode braille character nor a BRF character.`
    );
  }
  return cell;
}
