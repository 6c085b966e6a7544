import { describe, it, expect } from 'vitest';
import { brfTable, brfToCell, cellToBrf, parseCellCharacter } from './braille';
import { BrailleCell, EMPTY_CELL, FULL_CELL } from './brailleCell';

describe('Braille ASCII - brfToCell', () => {
  it('should read letters in either case', () => {
    const d = BrailleCell.fromDots([1, 4, 5]);
    expect(brfToCell('D')).toBe(d);
    expect(brfToCell('d')).toBe(d);
    expect(brfToCell('a')).toBe(BrailleCell.fromDots([1]));
  });

  it('should read space as the empty cell and = as the full six-dot cell', () => {
    expect(brfToCell(' ')).toBe(EMPTY_CELL);
    expect(brfToCell('=')).toBe(BrailleCell.fromDots([1, 2, 3, 4, 5, 6]));
  });

  it('should fold { | } ~ down onto [ \\ ] ^', () => {
    expect(brfToCell('{')).toBe(brfToCell('['));
    expect(brfToCell('{')).toBe(BrailleCell.fromDots([2, 4, 6]));
    expect(brfToCell('~')).toBe(brfToCell('^'));
  });

  it('should return null outside the BRF range', () => {
    expect(brfToCell('\n')).toBeNull();
    expect(brfToCell('é')).toBeNull();
    expect(brfToCell('⠙')).toBeNull();
    expect(brfToCell('')).toBeNull();
    expect(brfToCell('ab')).toBeNull();
  });
});

describe('Braille ASCII - cellToBrf', () => {
  it('should write six-dot cells in upper case', () => {
    expect(cellToBrf(BrailleCell.fromDots([1, 4, 5]))).toBe('D');
    expect(cellToBrf(BrailleCell.fromDots([1, 3]))).toBe('K');
    expect(cellToBrf(EMPTY_CELL)).toBe(' ');
  });

  it('should return null when dot 7 or 8 is raised', () => {
    expect(cellToBrf(BrailleCell.fromDots([7]))).toBeNull();
    expect(cellToBrf(BrailleCell.fromDots([1, 8]))).toBeNull();
    expect(cellToBrf(FULL_CELL)).toBeNull();
  });

  it('should write back every BRF character it reads', () => {
    for (let code = 0x20; code <= 0x5f; code++) {
      const char = String.fromCharCode(code);
      const cell = brfToCell(char);
      expect(cell).not.toBeNull();
      if (cell) expect(cellToBrf(cell)).toBe(char);
    }
  });
});

describe('Braille ASCII - parseCellCharacter', () => {
  it('should prefer Unicode braille', () => {
    expect(parseCellCharacter('⠙')?.cellValue).toBe(25);
    expect(parseCellCharacter('⣀')?.cellValue).toBe(0xc0);
  });

  it('should fall back to BRF', () => {
    expect(parseCellCharacter('d')?.cellValue).toBe(25);
  });

  it('should return null for anything else', () => {
    expect(parseCellCharacter('\t')).toBeNull();
    expect(parseCellCharacter('')).toBeNull();
  });
});

describe('Braille ASCII - brfTable', () => {
  it('should list the 64 six-dot cells once each', () => {
    const table = brfTable();
    expect(table).toHaveLength(64);
    expect(table[0]).toEqual({ brf: ' ', cell: EMPTY_CELL });
    expect(table[33]).toEqual({ brf: 'A', cell: BrailleCell.fromDots([1]) });
    expect(new Set(table.map((entry) => entry.cell)).size).toBe(64);
    expect(table.every((entry) => entry.cell.isSixDot)).toBe(true);
  });
});
