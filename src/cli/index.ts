/**
 * braille-cell CLI
 *
 * Commands:
 * - dots:    build a cell from dot lists (several lists are merged)
 * - value:   build a cell from its byte value
 * - char:    read a Unicode braille or BRF character
 * - merge:   raise every dot raised in either cell
 * - flatten: press flat in the first cell every dot raised in the second
 * - table:   list the 64 six-dot cells in BRF order
 */

import { Command, CommanderError, Option } from 'commander';
import { isOutputFormat, loadConfig, OUTPUT_FORMATS, type CellToolConfig, type OutputFormat } from '../config';
import { EMPTY_CELL, flatten, merge, type BrailleCell } from '../utils/brailleCell';
import { brfTable } from '../utils/braille';
import { formatCell } from './format';
import { parseCellValue, parseCharacter, parseDotList } from './parse';

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
}

const consoleIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

// Variadic arguments are folded one value at a time.
function collectDots(list: string, previous: BrailleCell | undefined): BrailleCell {
  return merge(previous ?? EMPTY_CELL, parseDotList(list));
}

export function createProgram(config: CellToolConfig, io: CliIO = consoleIO): Command {
  const program = new Command();

  // Set before the subcommands are added so they inherit both.
  program
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.out(text.trimEnd()),
      writeErr: (text) => io.err(text.trimEnd()),
    });

  program
    .name('braille-cell')
    .description('Inspect and combine eight-dot braille cells')
    .addOption(
      new Option('-f, --format <format>', 'output format')
        .choices(OUTPUT_FORMATS)
        .default(config.format)
    );

  function outputFormat(): OutputFormat {
    const { format } = program.opts<{ format: string }>();
    return isOutputFormat(format) ? format : config.format;
  }

  function print(cell: BrailleCell): void {
    io.out(formatCell(cell, outputFormat()));
  }

  program
    .command('dots')
    .description('Cell with the given dots raised, e.g. 145 or 1-4-5')
    .argument('<dots...>', 'dot lists; "none" for the empty cell', collectDots)
    .action((cell: BrailleCell) => {
      print(cell);
    });

  program
    .command('value')
    .description('Cell for a byte value (higher bits are ignored)')
    .argument('<value>', 'decimal, 0x hex or 0b binary integer', parseCellValue)
    .action((cell: BrailleCell) => {
      print(cell);
    });

  program
    .command('char')
    .description('Cell for a Unicode braille or BRF character')
    .argument('<character>', 'one character', parseCharacter)
    .action((cell: BrailleCell) => {
      print(cell);
    });

  program
    .command('merge')
    .description('Raise every dot raised in either cell')
    .argument('<a>', 'dot list', parseDotList)
    .argument('<b>', 'dot list', parseDotList)
    .action((a: BrailleCell, b: BrailleCell) => {
      print(merge(a, b));
    });

  program
    .command('flatten')
    .description('Press flat in <a> every dot raised in <b>')
    .argument('<a>', 'dot list', parseDotList)
    .argument('<b>', 'dot list', parseDotList)
    .action((a: BrailleCell, b: BrailleCell) => {
      print(flatten(a, b));
    });

  program
    .command('table')
    .description('List the 64 six-dot cells in Braille ASCII order')
    .action(() => {
      for (const { cell } of brfTable()) {
        print(cell);
      }
    });

  return program;
}

/**
 * Parses `argv` (node-style, script path included) and runs the matching
 * command. Returns the process exit code.
 */
export function run(argv: string[], io: CliIO = consoleIO, env: NodeJS.ProcessEnv = process.env): number {
  try {
    createProgram(loadConfig(env), io).parse(argv);
    return 0;
  } catch (err) {
    // Commander has already written its own message (usage error, help).
    // Errors raised by the cell itself, such as a dot outside 1-8, have not.
    if (err instanceof CommanderError) {
      return err.exitCode;
    }
    io.err(`[braille-cell] ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }
}
