/**
 * bftsim command-line interface.
 *
 * {@link run} takes the user arguments and returns the exit code together
 * with everything written to stdout and stderr, so it can be driven from
 * tests; `bin.ts` wires it to the process.
 *
 * @packageDocumentation
 */

import { setTimeout as sleepMs } from 'timers/promises';

import {
  BFTSIM_VERSION,
  BftSimError,
  BftSimErrorCode,
  Logger,
  LogLevel,
  errorMessage,
  formatError,
  isOneOf,
  parseIntStrict,
  parseLogLevel,
  parseNumberStrict,
} from '@bftsim/types';
import {
  ATTACK_TYPES,
  buildTopology,
  implementedAttacks,
  parseAttackType,
  resolveConfig,
  runSimulation,
} from '@bftsim/simulator';
import type { SimulationConfigInput, SimulationStatus } from '@bftsim/simulator';

import { loadConfig, OUTPUT_FORMATS } from './config';
import type { BftSimFileConfig, OutputFormat } from './config';
import { error, getColorsEnabled, setColorsEnabled } from './format';
import { EventRenderer, renderSummary, renderTopology } from './render';

// ─── Public types ───────────────────────────────────────────────────────────────

export interface CliResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  /** Directory to search for `bftsim.config.json`. Defaults to `process.cwd()`. */
  cwd?: string;
  /** Pause between phases of text output. */
  sleep?: (ms: number) => Promise<void>;
  /** Receives stdout as it is produced, in addition to the returned buffer. */
  onStdout?: (chunk: string) => void;
  onStderr?: (chunk: string) => void;
}

/** Process exit code for each run status. Usage and config errors exit 1. */
export const EXIT_CODES: Record<SimulationStatus, number> = {
  completed: 0,
  failed: 1,
  'not-implemented': 2,
};

// ─── Argument parsing ───────────────────────────────────────────────────────────

export interface ParsedArgs {
  command: string;
  positional: string[];
  flags: Record<string, string | boolean>;
}

const BOOLEAN_FLAGS: ReadonlySet<string> = new Set(['no-color', 'no-config', 'help']);

const SIMULATION_FLAGS: ReadonlySet<string> = new Set([
  'validators',
  'faults',
  'quorum',
  'leader',
  'attack',
  'double-signers',
  'delay',
  'format',
  'log-level',
  'config',
  ...BOOLEAN_FLAGS,
]);

/** Split user arguments into a command, positionals and `--flag [value]` pairs. */
export function parseArgs(args: readonly string[]): ParsedArgs {
  const positional: string[] = [];
  const flags: Record<string, string | boolean> = {};
  let command = '';

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';
    if (arg.startsWith('--')) {
      const eq = arg.indexOf('=');
      if (eq !== -1) {
        flags[arg.slice(2, eq)] = arg.slice(eq + 1);
        continue;
      }
      const key = arg.slice(2);
      const next = args[i + 1];
      if (!BOOLEAN_FLAGS.has(key) && next !== undefined && !next.startsWith('--')) {
        flags[key] = next;
        i += 1;
      } else {
        flags[key] = true;
      }
    } else if (command === '') {
      command = arg;
    } else {
      positional.push(arg);
    }
  }

  return { command, positional, flags };
}

function flagValue(flags: ParsedArgs['flags'], key: string): string | undefined {
  const value = flags[key];
  if (value === undefined) return undefined;
  if (value === true || value === false) {
    throw new BftSimError(BftSimErrorCode.INVALID_OPTION, `Option --${key} requires a value`);
  }
  return value;
}

function intFlag(flags: ParsedArgs['flags'], key: string): number | undefined {
  const text = flagValue(flags, key);
  if (text === undefined) return undefined;
  const value = parseIntStrict(text);
  if (value === undefined) {
    throw new BftSimError(BftSimErrorCode.INVALID_OPTION, `Option --${key} expects an integer, got '${text}'`);
  }
  return value;
}

function numberFlag(flags: ParsedArgs['flags'], key: string): number | undefined {
  const text = flagValue(flags, key);
  if (text === undefined) return undefined;
  const value = parseNumberStrict(text);
  if (value === undefined) {
    throw new BftSimError(BftSimErrorCode.INVALID_OPTION, `Option --${key} expects a number, got '${text}'`);
  }
  return value;
}

function checkFlags(parsed: ParsedArgs): void {
  for (const key of Object.keys(parsed.flags)) {
    if (!SIMULATION_FLAGS.has(key)) {
      throw new BftSimError(BftSimErrorCode.INVALID_OPTION, `Unknown option --${key}`, {
        hint: "Run 'bftsim help' for usage",
      });
    }
  }
  const [extra] = parsed.positional;
  if (extra !== undefined) {
    throw new BftSimError(BftSimErrorCode.INVALID_OPTION, `Unexpected argument '${extra}'`);
  }
}

// ─── Settings ───────────────────────────────────────────────────────────────────

export interface CliSettings {
  input: SimulationConfigInput;
  format: OutputFormat;
  logLevel: LogLevel;
}

/** Merge flags over the config file over built-in defaults. */
export function resolveSettings(parsed: ParsedArgs, cwd?: string): CliSettings {
  checkFlags(parsed);
  const { flags } = parsed;

  const file: BftSimFileConfig =
    flags['no-config'] === true ? {} : (loadConfig(cwd, flagValue(flags, 'config'))?.config ?? {});

  const input: SimulationConfigInput = {};
  const validatorCount = intFlag(flags, 'validators') ?? file.validators;
  if (validatorCount !== undefined) input.validatorCount = validatorCount;
  const faultTolerance = intFlag(flags, 'faults') ?? file.faults;
  if (faultTolerance !== undefined) input.faultTolerance = faultTolerance;
  const quorum = intFlag(flags, 'quorum') ?? file.quorum;
  if (quorum !== undefined) input.quorum = quorum;

  const leaderText = flagValue(flags, 'leader');
  if (leaderText !== undefined) {
    input.faultyLeader = leaderText.toLowerCase() === 'none' ? null : leaderText;
  } else if (file.leader !== undefined) {
    input.faultyLeader = file.leader;
  }

  const attackText = flagValue(flags, 'attack');
  const attack = attackText !== undefined ? parseAttackType(attackText) : file.attack;
  if (attack !== undefined) input.attack = attack;

  const signersText = flagValue(flags, 'double-signers');
  const doubleSigners =
    signersText !== undefined
      ? signersText.split(',').map((id) => id.trim()).filter((id) => id.length > 0)
      : file.doubleSigners;
  if (doubleSigners !== undefined) input.doubleSigners = doubleSigners;

  const stepDelay = numberFlag(flags, 'delay') ?? file.delay;
  if (stepDelay !== undefined) input.stepDelay = stepDelay;

  const format = flagValue(flags, 'format') ?? file.format ?? 'text';
  if (!isOneOf(format, OUTPUT_FORMATS)) {
    throw new BftSimError(BftSimErrorCode.INVALID_OPTION, `Unknown output format '${format}'`, {
      hint: `Use one of: ${OUTPUT_FORMATS.join(', ')}`,
    });
  }

  const levelText = flagValue(flags, 'log-level') ?? file.logLevel ?? 'warn';
  const logLevel = parseLogLevel(levelText);
  if (logLevel === undefined) {
    throw new BftSimError(BftSimErrorCode.INVALID_OPTION, `Unknown log level '${levelText}'`, {
      hint: 'Use one of: debug, info, warn, error, silent',
    });
  }

  return { input, format, logLevel };
}

// ─── Output buffer ──────────────────────────────────────────────────────────────

class Output {
  private readonly out: string[] = [];
  private readonly err: string[] = [];

  constructor(private readonly options: RunOptions) {}

  stdout(text: string): void {
    const chunk = `${text}\n`;
    this.out.push(chunk);
    this.options.onStdout?.(chunk);
  }

  stderr(text: string): void {
    const chunk = `${text}\n`;
    this.err.push(chunk);
    this.options.onStderr?.(chunk);
  }

  result(exitCode: number): CliResult {
    return { exitCode, stdout: this.out.join(''), stderr: this.err.join('') };
  }
}

// ─── Commands ───────────────────────────────────────────────────────────────────

async function cmdRun(parsed: ParsedArgs, out: Output, options: RunOptions): Promise<CliResult> {
  const settings = resolveSettings(parsed, options.cwd);
  const logger = new Logger({
    level: settings.logLevel,
    component: 'bftsim',
    output: (entry) => out.stderr(JSON.stringify(entry)),
  });

  const result = runSimulation(settings.input, { logger });

  if (settings.format === 'json') {
    out.stdout(JSON.stringify(result, null, 2));
    return out.result(EXIT_CODES[result.status]);
  }

  const pause = result.config.stepDelay * 1000;
  const sleep = options.sleep ?? ((ms: number) => sleepMs(ms));
  const renderer = new EventRenderer();
  for (const event of result.events) {
    const { lines, changed } = renderer.render(event);
    if (changed && pause > 0) {
      await sleep(pause);
    }
    for (const line of lines) {
      out.stdout(line);
    }
  }
  out.stdout('');
  out.stdout(renderSummary(result));
  return out.result(EXIT_CODES[result.status]);
}

function cmdTopology(parsed: ParsedArgs, out: Output, options: RunOptions): CliResult {
  const settings = resolveSettings(parsed, options.cwd);
  const config = resolveConfig(settings.input);
  const topology = buildTopology(config.validators, config.faultyLeader);
  out.stdout(settings.format === 'json' ? JSON.stringify(topology, null, 2) : renderTopology(topology));
  return out.result(0);
}

export function helpText(): string {
  return [
    'bftsim - BFT safety simulator',
    '',
    'Usage: bftsim <command> [options]',
    '',
    'Commands:',
    '  run                      Run the scripted attack scenario',
    '  topology                 Show the validator display graph',
    '  help                     Show this help message',
    '  version                  Show version information',
    '',
    'Options:',
    '  --validators <n>         Number of validators, 4..13 (default: 7)',
    '  --faults <f>             Fault bound, at most floor((n - 1) / 3)',
    '  --quorum <q>             Override the 2f + 1 quorum',
    "  --leader <id|none>       Faulty leader of view 1 (default: first validator)",
    `  --attack <type>          ${ATTACK_TYPES.join(', ')} (default: equivocation)`,
    `                           scripted: ${implementedAttacks().join(', ')}; others exit 2`,
    '  --double-signers <ids>   Comma-separated validators that sign every attack proposal',
    '  --delay <seconds>        Pause between phases of text output (default: 0.9)',
    '  --format <text|json>     Output format (default: text)',
    '  --log-level <level>      debug, info, warn, error or silent; logs go to stderr (default: warn)',
    '  --config <file>          Config file to use instead of searching for bftsim.config.json',
    '  --no-config              Ignore bftsim.config.json',
    '  --no-color               Disable colored output',
    '',
    'Exit codes: 0 completed, 1 usage, configuration or round error, 2 attack not implemented',
  ].join('\n');
}

// ─── Entry point ────────────────────────────────────────────────────────────────

/**
 * Run the CLI with user arguments (without the node and script paths).
 *
 * @example
 * ```typescript
 * const r = await run(['run', '--validators', '4', '--delay', '0']);
 * r.exitCode; // 0
 * ```
 */
export async function run(args: readonly string[], options: RunOptions = {}): Promise<CliResult> {
  const out = new Output(options);
  const previousColors = getColorsEnabled();

  try {
    const parsed = parseArgs(args);
    if (parsed.flags['no-color'] === true) {
      setColorsEnabled(false);
    }

    if (parsed.command === '' || parsed.command === 'help' || parsed.flags['help'] === true) {
      out.stdout(helpText());
      return out.result(0);
    }

    switch (parsed.command) {
      case 'version':
        out.stdout(`bftsim v${BFTSIM_VERSION}`);
        return out.result(0);
      case 'run':
        return await cmdRun(parsed, out, options);
      case 'topology':
        return cmdTopology(parsed, out, options);
      default:
        throw new BftSimError(BftSimErrorCode.UNKNOWN_COMMAND, `Unknown command '${parsed.command}'`, {
          hint: "Run 'bftsim help' for usage",
        });
    }
  } catch (err) {
    out.stderr(error(err instanceof BftSimError ? formatError(err) : errorMessage(err)));
    return out.result(1);
  } finally {
    setColorsEnabled(previousColors);
  }
}
