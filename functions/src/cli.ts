/**
 * Set-Log CLI
 *
 * Usage:
 *   # List the exercises of a single-session log
 *   setlog parse log.txt
 *
 *   # Write the set-centric workout document
 *   setlog export log.txt --output workout.json
 *
 *   # Flatten a multi-session log into a TSV table
 *   setlog batch history.txt --output history.tsv
 */

import * as fs from 'fs';
import type { RejectedLine } from '../../shared/types';
import { loadConfig } from './config';
import type { SetLogConfig } from './config';
import {
  formatTsv,
  serializeSessions,
  serializeToSetCentric,
  toTsvRows,
} from './export/serializers';
import { validateSetCentricDocument } from './export/validator';
import {
  formatExerciseRecord,
  LogLineError,
  parseWorkoutLog,
  parseWorkoutSessions,
  recordVolume,
} from './services/setlog';
import type { ReadLogOptions } from './services/setlog';
import { configureStandardizer } from './synonyms';

export interface CliOptions {
  /** Environment passed to loadConfig; process.env (plus .env) when omitted */
  env?: NodeJS.ProcessEnv;
  /** Timestamp of exported documents */
  now?: () => Date;
}

class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

// ============================================================================
// Arguments
// ============================================================================

// Options followed by a value; every other option is a flag
const VALUE_OPTIONS = ['format', 'output'];

class CliArgs {
  constructor(private readonly args: string[]) {}

  get command(): string | undefined {
    return this.args[0];
  }

  /** First argument after the command that is neither a flag nor a flag's value */
  get input(): string | undefined {
    for (let i = 1; i < this.args.length; i++) {
      const arg = this.args[i];
      if (!arg.startsWith('--')) {
        return arg;
      }
      if (VALUE_OPTIONS.includes(arg.slice(2))) {
        i++;
      }
    }
    return undefined;
  }

  getArg(name: string): string | undefined {
    const index = this.args.indexOf(`--${name}`);
    if (index === -1 || index + 1 >= this.args.length) return undefined;
    return this.args[index + 1];
  }

  hasFlag(name: string): boolean {
    return this.args.includes(`--${name}`);
  }

  getChoice<T extends string>(name: string, choices: readonly T[], fallback: T): T {
    const value = this.getArg(name);
    if (value === undefined) return fallback;
    const match = choices.find((choice) => choice === value);
    if (!match) {
      throw new CliUsageError(`--${name} must be one of: ${choices.join(', ')}`);
    }
    return match;
  }
}

function printUsage() {
  console.log(`
Set-Log CLI

Commands:
  parse <file>                 List the exercises of a single-session log
  export <file>                Write the set-centric workout document
  batch <file>                 Parse a multi-session log

Options for 'parse':
  --format <text|json>         Output format (default: text)

Options for 'export':
  --output <file>              Output JSON file (default: stdout)
  --no-validate                Skip schema validation

Options for 'batch':
  --output <file>              Output file (default: stdout)
  --format <tsv|json>          Output format (default: tsv)

Common options:
  --strict                     Stop at the first line that cannot be parsed

Environment:
  SETLOG_WEIGHT_UNIT, SETLOG_SYNONYMS_PATH, SETLOG_ON_LINE_ERROR,
  SETLOG_TSV_DECIMAL_SEPARATOR

Examples:
  setlog parse log.txt
  setlog export log.txt --output workout.json
  setlog batch history.txt --format json > history.json
`);
}

// ============================================================================
// Helpers
// ============================================================================

function readInput(args: CliArgs): string {
  const input = args.input;
  if (!input) {
    throw new CliUsageError(`Missing input file for '${args.command}'`);
  }
  if (!fs.existsSync(input)) {
    throw new CliUsageError(`Input file not found: ${input}`);
  }
  return fs.readFileSync(input, 'utf-8');
}

function readOptions(args: CliArgs, config: SetLogConfig): ReadLogOptions {
  return {
    unit: config.weightUnit,
    standardizer: configureStandardizer(config),
    onLineError: args.hasFlag('strict') ? 'abort' : config.onLineError,
  };
}

function reportRejected(rejected: RejectedLine[]) {
  for (const line of rejected) {
    console.error(`Line ${line.lineNumber}: ${line.error.message} -> "${line.source}"`);
  }
  if (rejected.length > 0) {
    console.error(`${rejected.length} line(s) skipped`);
  }
}

function writeOutput(args: CliArgs, content: string) {
  const output = args.getArg('output');
  if (output) {
    fs.writeFileSync(output, content);
    console.log(`Wrote ${output}`);
  } else {
    console.log(content);
  }
}

// ============================================================================
// Commands
// ============================================================================

function runParse(args: CliArgs, config: SetLogConfig, now: () => Date): number {
  const format = args.getChoice('format', ['text', 'json'], 'text');
  const log = parseWorkoutLog(readInput(args), readOptions(args, config));

  if (format === 'json') {
    console.log(JSON.stringify(serializeToSetCentric(log.exercises, now()), null, 2));
  } else {
    for (const record of log.exercises) {
      console.log(`${formatExerciseRecord(record)} (volume ${recordVolume(record)}${config.weightUnit})`);
    }
  }

  reportRejected(log.rejected);
  return 0;
}

function runExport(args: CliArgs, config: SetLogConfig, now: () => Date): number {
  const log = parseWorkoutLog(readInput(args), readOptions(args, config));
  const document = serializeToSetCentric(log.exercises, now());
  reportRejected(log.rejected);

  if (!args.hasFlag('no-validate')) {
    const validation = validateSetCentricDocument(document);
    if (!validation.ok) {
      console.error(`Export failed schema validation:\n${validation.errors}`);
      return 1;
    }
  }

  writeOutput(args, JSON.stringify(document, null, 2));
  return 0;
}

function runBatch(args: CliArgs, config: SetLogConfig): number {
  const format = args.getChoice('format', ['tsv', 'json'], 'tsv');
  const sessions = parseWorkoutSessions(readInput(args), readOptions(args, config));
  reportRejected(sessions.flatMap((session) => session.rejected));

  const content =
    format === 'json'
      ? JSON.stringify(serializeSessions(sessions), null, 2)
      : formatTsv(toTsvRows(sessions, { decimalSeparator: config.tsvDecimalSeparator }));

  writeOutput(args, content);
  return 0;
}

/**
 * Run one CLI invocation
 *
 * @param argv - Arguments after the executable, e.g. ['parse', 'log.txt']
 * @returns Process exit code
 */
export function runCli(argv: string[], options: CliOptions = {}): number {
  const args = new CliArgs(argv);
  const command = args.command;
  const now = options.now ?? (() => new Date());

  if (!command || command === 'help' || command === '--help') {
    printUsage();
    return 0;
  }

  try {
    const config = loadConfig(options.env);

    switch (command) {
      case 'parse':
        return runParse(args, config, now);
      case 'export':
        return runExport(args, config, now);
      case 'batch':
        return runBatch(args, config);
      default:
        console.error(`Unknown command: ${command}`);
        printUsage();
        return 1;
    }
  } catch (error) {
    if (error instanceof LogLineError) {
      console.error(`Aborted: ${error.message} -> "${error.source}"`);
      return 1;
    }
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }
}
