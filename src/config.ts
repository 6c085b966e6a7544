/**
 * Runtime settings for the braille-cell CLI, read from the environment.
 *
 *   BRAILLE_CELL_FORMAT   text | json   (default: text)
 */

export const OUTPUT_FORMATS = ['text', 'json'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export interface CellToolConfig {
  format: OutputFormat;
}

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): CellToolConfig {
  const format = env.BRAILLE_CELL_FORMAT ?? 'text';
  if (!isOutputFormat(format)) {
    throw new Error(
      `Unsupported BRAILLE_CELL_FORMAT "${format}" (expected ${OUTPUT_FORMATS.join(' or ')}).`
    );
  }
  return { format };
}
