/**
 * BrailleCell — one eight-dot braille cell as an immutable byte.
 *
 * Bit (n - 1) of `cellValue` is dot n:
 *
 *     1 ● ● 4        0x01  0x08
 *     2 ● ● 5        0x02  0x10
 *     3 ● ● 6        0x04  0x20
 *     7 ● ● 8        0x40  0x80
 *
 * which is exactly the offset of the matching character in the Unicode
 * Braille Patterns block (U+2800 to U+28FF).
 *
 * All 256 cells are built once at module load and every constructor hands
 * back the canonical instance, so `a === b` whenever `a.equals(b)`.
 */

/** First code point of the Unicode Braille Patterns block (the blank cell). */
export const UNICODE_BRAILLE_BASE = 0x2800;

export const BLANK_BRAILLE_CHARACTER = String.fromCharCode(UNICODE_BRAILLE_BASE);

const CELL_MASK = 0xff;
const DOTS_PER_CELL = 8;

export type DotNumber = 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8;

/** Dots 1-8 as booleans; index 0 is dot 1. */
export type DotArray = [boolean, boolean, boolean, boolean, boolean, boolean, boolean, boolean];

export const DOT_NUMBERS: readonly DotNumber[] = [1, 2, 3, 4, 5, 6, 7, 8];

// ─── Errors ──────────────────────────────────────────────────────────────────

/**
 * Raised whenever a dot index lies outside 1-8. Dot addressing never clamps
 * or guesses; raw values go through {@link BrailleCell.fromValue} instead.
 */
export class InvalidDotNumberError extends RangeError {
    readonly dotNumber: number;

    constructor(dotNumber: number) {
        super(`Dot number must be an integer between 1 and 8, got ${dotNumber}.`);
        this.name = 'InvalidDotNumberError';
        this.dotNumber = dotNumber;
    }
}

export function isDotNumber(value: number): value is DotNumber {
    return Number.isInteger(value) && value >= 1 && value <= DOTS_PER_CELL;
}

function dotBit(dotNumber: number): number {
    if (!isDotNumber(dotNumber)) {
        throw new InvalidDotNumberError(dotNumber);
    }
    return 1 << (dotNumber - 1);
}

// ─── Value type ──────────────────────────────────────────────────────────────

export class BrailleCell {
    private static readonly cells: readonly BrailleCell[] = Object.freeze(
        Array.from({ length: CELL_MASK + 1 }, (_, value) => new BrailleCell(value))
    );

    /** Dot states, one bit per dot. Always 0-255. */
    readonly cellValue: number;

    private constructor(cellValue: number) {
        this.cellValue = cellValue;
        Object.freeze(this);
    }

    /**
     * The cell for the low eight bits of `value`. Higher bits are dropped
     * without complaint.
     */
    static fromValue(value: number): BrailleCell {
        return BrailleCell.cells[value & CELL_MASK];
    }

    /**
     * The cell with exactly the given dots raised. Repeated dots are harmless.
     * Throws {@link InvalidDotNumberError} for the first dot outside 1-8.
     */
    static fromDots(dotNumbers: Iterable<number>): BrailleCell {
        let value = 0;
        for (const dot of dotNumbers) {
            value |= dotBit(dot);
        }
        return BrailleCell.fromValue(value);
    }

    static fromDotArray(dots: DotArray): BrailleCell {
        let value = 0;
        dots.forEach((raised, index) => {
            if (raised) value |= 1 << index;
        });
        return BrailleCell.fromValue(value);
    }

    /**
     * Inverse of {@link character}. Null unless `char` is a single code point
     * from the Braille Patterns block.
     */
    static fromCharacter(char: string): BrailleCell | null {
        if (char.length !== 1) return null;
        const offset = char.charCodeAt(0) - UNICODE_BRAILLE_BASE;
        if (offset < 0 || offset > CELL_MASK) return null;
        return BrailleCell.fromValue(offset);
    }

    /** Numeric order of the underlying byte; fit for `Array.prototype.sort`. */
    static compare(a: BrailleCell, b: BrailleCell): number {
        return a.cellValue - b.cellValue;
    }

    get character(): string {
        return String.fromCharCode(UNICODE_BRAILLE_BASE + this.cellValue);
    }

    get dotCount(): number {
        let count = 0;
        for (let bits = this.cellValue; bits !== 0; bits &= bits - 1) {
            count++;
        }
        return count;
    }

    get isEmpty(): boolean {
        return this.cellValue === 0;
    }

    /** True when neither dot 7 nor dot 8 is raised. */
    get isSixDot(): boolean {
        return (this.cellValue & 0xc0) === 0;
    }

    dotIsRaised(dotNumber: number): boolean {
        return (this.cellValue & dotBit(dotNumber)) !== 0;
    }

    raisedDots(): DotNumber[] {
        return DOT_NUMBERS.filter((dot) => (this.cellValue & (1 << (dot - 1))) !== 0);
    }

    toDotArray(): DotArray {
        const dots: DotArray = [false, false, false, false, false, false, false, false];
        for (let i = 0; i < DOTS_PER_CELL; i++) {
            dots[i] = (this.cellValue & (1 << i)) !== 0;
        }
        return dots;
    }

    merge(other: BrailleCell): BrailleCell {
        return merge(this, other);
    }

    raiseDot(dotNumber: number): BrailleCell {
        return raiseDot(this, dotNumber);
    }

    flatten(other: BrailleCell): BrailleCell {
        return flatten(this, other);
    }

    lowerDot(dotNumber: number): BrailleCell {
        return lowerDot(this, dotNumber);
    }

    /**
     * Like {@link BrailleCell.compare}, but also takes a missing value, which
     * orders before every cell.
     */
    compareTo(other: BrailleCell | null | undefined): number {
        if (other == null) return 1;
        return BrailleCell.compare(this, other);
    }

    equals(other: unknown): boolean {
        return other instanceof BrailleCell && other.cellValue === this.cellValue;
    }

    hashCode(): number {
        return this.cellValue;
    }

    toDisplayString(): string {
        return this.character;
    }

    toString(): string {
        return this.character;
    }
}

export const EMPTY_CELL = BrailleCell.fromValue(0);

/** Every dot raised. */
export const FULL_CELL = BrailleCell.fromValue(CELL_MASK);

// ─── Algebra ─────────────────────────────────────────────────────────────────

/** Every dot raised in either cell. */
export function merge(a: BrailleCell, b: BrailleCell): BrailleCell {
    return BrailleCell.fromValue(a.cellValue | b.cellValue);
}

export function raiseDot(cell: BrailleCell, dotNumber: number): BrailleCell {
    return BrailleCell.fromValue(cell.cellValue | dotBit(dotNumber));
}

/** `a` with every dot that is raised in `b` pressed flat. */
export function flatten(a: BrailleCell, b: BrailleCell): BrailleCell {
    return BrailleCell.fromValue(a.cellValue & ~b.cellValue);
}

export function lowerDot(cell: BrailleCell, dotNumber: number): BrailleCell {
    return BrailleCell.fromValue(cell.cellValue & ~dotBit(dotNumber));
}

export function compare(a: BrailleCell, b: BrailleCell): number {
    return BrailleCell.compare(a, b);
}
