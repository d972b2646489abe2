/**
 * Command behind `decode-duid`: argument handling, output selection and
 * exit codes. Output goes through a CliOutput so the command can run
 * without touching the process.
 */
import { decodeDuidHex } from '../decode.js';
import { InvalidHexEncodingError } from '../errors.js';
import { describeDuid, duidToJson, formatDuid } from '../format.js';

export interface CliOutput {
  log(message: string): void;
  error(message: string): void;
}

export const consoleOutput: CliOutput = {
  log: message => console.log(message),
  error: message => console.error(message),
};

export type OutputMode = 'string' | 'verbose' | 'json';

export interface RunOptions {
  /** Highlight report labels with ANSI escapes. */
  color: boolean;
}

export type ParsedArgs =
  | { kind: 'run'; input: string; mode: OutputMode }
  | { kind: 'help' }
  | { kind: 'usage-error'; message: string };

export const USAGE = [
  'Usage: decode-duid [--verbose | --json] <DUID_hex_string>',
  'Example: decode-duid 00:01:00:01:2c:3d:4e:5f:aa:bb:cc:dd:ee:ff',
  '',
  'Options:',
  '  -v, --verbose  print every decoded field',
  '      --json     print the decoded DUID as JSON',
  '  -h, --help     show this help',
];

const DIM = '\x1b[2m';
const BOLD = '\x1b[1m';
const CYAN = '\x1b[36m';
const RESET = '\x1b[0m';

/** Colour only on a terminal, and never when NO_COLOR is set to a non-empty value. */
export function shouldUseColor(
  stream: { isTTY?: boolean },
  env: Record<string, string | undefined>,
): boolean {
  const noColor = env.NO_COLOR;
  return stream.isTTY === true && (noColor === undefined || noColor === '');
}

export function parseArgs(args: string[]): ParsedArgs {
  const positional: string[] = [];
  let verbose = false;
  let json = false;

  for (const arg of args) {
    if (arg === '-h' || arg === '--help') return { kind: 'help' };
    if (arg === '-v' || arg === '--verbose') {
      verbose = true;
    } else if (arg === '--json') {
      json = true;
    } else if (arg.startsWith('-')) {
      return { kind: 'usage-error', message: `Unknown option: ${arg}` };
    } else {
      positional.push(arg);
    }
  }

  if (verbose && json) {
    return { kind: 'usage-error', message: '--verbose and --json cannot be combined' };
  }
  if (positional.length !== 1) {
    return {
      kind: 'usage-error',
      message: 'DUID hex string is missing or extra arguments provided.',
    };
  }
  return { kind: 'run', input: positional[0], mode: verbose ? 'verbose' : json ? 'json' : 'string' };
}

/** Run the command and return the process exit code. */
export function runDecodeDuid(
  args: string[],
  output: CliOutput = consoleOutput,
  options: RunOptions = { color: false },
): number {
  const parsed = parseArgs(args);
  if (parsed.kind === 'help') {
    for (const line of USAGE) output.log(line);
    return 0;
  }
  if (parsed.kind === 'usage-error') {
    output.error(`Error: ${parsed.message}`);
    for (const line of USAGE) output.error(line);
    return 1;
  }

  const result = decodeDuidHex(parsed.input);
  if (!result.ok) {
    output.error(`Error: ${result.error.message}`);
    if (result.error instanceof InvalidHexEncodingError) {
      output.error('Ensure the string contains only hex characters (0-9, a-f, A-F) and optional colons.');
    }
    return 1;
  }

  const { duid } = result;
  switch (parsed.mode) {
    case 'string':
      output.log(formatDuid(duid));
      break;
    case 'json':
      output.log(JSON.stringify(duidToJson(duid), null, 2));
      break;
    case 'verbose': {
      const heading = (msg: string) => (options.color ? `${BOLD}${CYAN}${msg}${RESET}` : msg);
      const field = (label: string, value: string) =>
        options.color ? `  ${DIM}${label}:${RESET} ${value}` : `  ${label}: ${value}`;

      output.log(heading(formatDuid(duid)));
      output.log(field('Input DUID Hex', parsed.input));
      for (const { label, value } of describeDuid(duid)) {
        output.log(field(label, value));
      }
      break;
    }
  }
  return 0;
}
