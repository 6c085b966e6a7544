import { describe, it, expect } from 'vitest';
import { loadConfig } from './config';

describe('loadConfig', () => {
  it('should default to text output', () => {
    expect(loadConfig({})).toEqual({ format: 'text' });
  });

  it('should read BRAILLE_CELL_FORMAT', () => {
    expect(loadConfig({ BRAILLE_CELL_FORMAT: 'json' })).toEqual({ format: 'json' });
  });

  it('should reject unknown formats', () => {
    expect(() => loadConfig({ BRAILLE_CELL_FORMAT: 'xml' })).toThrow(
      'Unsupported BRAILLE_CELL_FORMAT "xml" (expected text or json).'
    );
  });
});
