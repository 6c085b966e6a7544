/**
 * Maps standard North American ASCII Braille (BRF) characters to braille cells.
 * ASCII range: 0x20 to 0x5F (Space to Underscore)
 * Cell range:  the 64 six-dot cells (U+2800 to U+283F)
 */

import brfOffsets from '../data/brf-offsets.json';
import { BrailleCell } from './brailleCell';

const BRF_FIRST = 0x20;
const BRF_SIZE = 64;

// Cell value -> BRF character, the inverse of brf-offsets.json
const CELL_TO_BRF = new Map<number, string>(
    brfOffsets.map((offset, index): [number, string] => [offset, String.fromCharCode(BRF_FIRST + index)])
);

export function brfToCell(char: string): BrailleCell | null {
    if (char.length !== 1) return null;

    let charCode = char.charCodeAt(0);

    // BRF has no lower half: 0x60-0x7F reads as its 0x40-0x5F twin (d as D, { as [)
    if (charCode >= 0x60 && charCode <= 0x7F) {
        charCode -= 0x20;
    }

    const index = charCode - BRF_FIRST;
    if (index < 0 || index >= BRF_SIZE) return null;

    return BrailleCell.fromValue(brfOffsets[index]);
}

/**
 * The upper-case BRF character for a six-dot cell.
 * Null when dot 7 or dot 8 is raised, since BRF has no room for them.
 */
export function cellToBrf(cell: BrailleCell): string | null {
    return CELL_TO_BRF.get(cell.cellValue) ?? null;
}

/**
 * Reads one cell from a single character: a Unicode braille pattern, or
 * failing that a BRF character. Null when it is neither.
 */
export function parseCellCharacter(text: string): BrailleCell | null {
    return BrailleCell.fromCharacter(text) ?? brfToCell(text);
}

/** Every six-dot cell paired with its BRF character, in ASCII order. */
export function brfTable(): Array<{ brf: string; cell: BrailleCell }> {
    return brfOffsets.map((offset, index) => ({
        brf: String.fromCharCode(BRF_FIRST + index),
        cell: BrailleCell.fromValue(offset),
    }));
}
