/**
 * bftsim configuration file support.
 *
 * Looks for `bftsim.config.json` in the working directory and its parents.
 * Every field is optional; command-line flags override file values.
 *
 * @packageDocumentation
 */

import { existsSync, readFileSync } from 'fs';
import { dirname, join, resolve } from 'path';

import {
  BftSimError,
  BftSimErrorCode,
  errorMessage,
  isFiniteNumber,
  isInteger,
  isNonEmptyString,
  isOneOf,
  isPlainObject,
  isStringArray,
} from '@bftsim/types';
import { ATTACK_TYPES } from '@bftsim/simulator';
import type { AttackType } from '@bftsim/simulator';

// ─── Types ──────────────────────────────────────────────────────────────────────

export const OUTPUT_FORMATS = ['text', 'json'] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

/** Shape of `bftsim.config.json`. */
export interface BftSimFileConfig {
  validators?: number;
  faults?: number;
  quorum?: number;
  /** Faulty leader id, or `null` for none. */
  leader?: string | null;
  attack?: AttackType;
  doubleSigners?: string[];
  /** Seconds between phases in text output. */
  delay?: number;
  format?: OutputFormat;
  logLevel?: string;
}

export const CONFIG_FILE_NAME = 'bftsim.config.json';

const KNOWN_KEYS: ReadonlySet<string> = new Set([
  'validators',
  'faults',
  'quorum',
  'leader',
  'attack',
  'doubleSigners',
  'delay',
  'format',
  'logLevel',
]);

// ─── Lookup ─────────────────────────────────────────────────────────────────────

/**
 * Search for a config file starting from `cwd` and walking up to the
 * filesystem root. Returns the absolute path, or `undefined`.
 */
export function findConfigFile(cwd?: string): string | undefined {
  let dir = resolve(cwd ?? '.');
  for (;;) {
    const candidate = join(dir, CONFIG_FILE_NAME);
    if (existsSync(candidate)) {
      return candidate;
    }
    const parent = dirname(dir);
    if (parent === dir) return undefined;
    dir = parent;
  }
}

// ─── Validation ─────────────────────────────────────────────────────────────────

function invalid(filePath: string, message: string): BftSimError {
  return new BftSimError(BftSimErrorCode.INVALID_CONFIG_FILE, `${filePath}: ${message}`, {
    context: { path: filePath },
    hint: `Fix or remove ${CONFIG_FILE_NAME}`,
  });
}

/**
 * Check the parsed JSON of a config file field by field.
 *
 * @throws {BftSimError} with `INVALID_CONFIG_FILE` naming the first bad field.
 */
export function validateFileConfig(raw: unknown, filePath = CONFIG_FILE_NAME): BftSimFileConfig {
  if (!isPlainObject(raw)) {
    throw invalid(filePath, 'expected a JSON object');
  }
  for (const key of Object.keys(raw)) {
    if (!KNOWN_KEYS.has(key)) {
      throw invalid(filePath, `unknown field '${key}'`);
    }
  }

  const config: BftSimFileConfig = {};
  const { validators, faults, quorum, leader, attack, doubleSigners, delay, format, logLevel } = raw;

  for (const [name, value] of [['validators', validators], ['faults', faults], ['quorum', quorum]] as const) {
    if (value !== undefined && !isInteger(value)) {
      throw invalid(filePath, `'${name}' must be an integer`);
    }
  }
  if (isInteger(validators)) config.validators = validators;
  if (isInteger(faults)) config.faults = faults;
  if (isInteger(quorum)) config.quorum = quorum;

  if (leader !== undefined) {
    if (leader !== null && !isNonEmptyString(leader)) {
      throw invalid(filePath, "'leader' must be a validator id or null");
    }
    config.leader = leader;
  }
  if (attack !== undefined) {
    if (!isOneOf(attack, ATTACK_TYPES)) {
      throw invalid(filePath, `'attack' must be one of ${ATTACK_TYPES.join(', ')}`);
    }
    config.attack = attack;
  }
  if (doubleSigners !== undefined) {
    if (!isStringArray(doubleSigners)) {
      throw invalid(filePath, "'doubleSigners' must be an array of validator ids");
    }
    config.doubleSigners = doubleSigners;
  }
  if (delay !== undefined) {
    if (!isFiniteNumber(delay)) {
      throw invalid(filePath, "'delay' must be a number of seconds");
    }
    config.delay = delay;
  }
  if (format !== undefined) {
    if (!isOneOf(format, OUTPUT_FORMATS)) {
      throw invalid(filePath, `'format' must be one of ${OUTPUT_FORMATS.join(', ')}`);
    }
    config.format = format;
  }
  if (logLevel !== undefined) {
    if (!isNonEmptyString(logLevel)) {
      throw invalid(filePath, "'logLevel' must be a level name");
    }
    config.logLevel = logLevel;
  }
  return config;
}

/**
 * Read and validate a config file. With no `explicitPath`, searches upward
 * from `cwd` and returns `undefined` when nothing is found.
 */
export function loadConfig(
  cwd?: string,
  explicitPath?: string,
): { path: string; config: BftSimFileConfig } | undefined {
  const filePath = explicitPath !== undefined ? resolve(cwd ?? '.', explicitPath) : findConfigFile(cwd);
  if (filePath === undefined) return undefined;

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new BftSimError(BftSimErrorCode.INVALID_CONFIG_FILE, `${filePath}: ${errorMessage(err)}`, {
      context: { path: filePath },
      ...(err instanceof Error ? { cause: err } : {}),
    });
  }
  return { path: filePath, config: validateFileConfig(parsed, filePath) };
}
