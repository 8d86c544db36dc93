/**
 * Command implementations for the `xi` CLI.
 *
 * Provides:
 * - oscillate: print or save a period-2 state sequence
 * - attractor: build, optionally validate, print or save an attractor
 * - verify: run the verification suite
 * - help / version
 *
 * @packageDocumentation
 */

import { SIMPLIFICATION_RULES, type SimplificationRules } from '../algebra/index.js';
import { buildAttractor, serializeAttractor } from '../closure/index.js';
import { loadConfig, type Config, type EnvRecord } from '../config/index.js';
import { iterate } from '../oscillator/index.js';
import { Logger } from '../utils/logger.js';
import { safeWriteFile } from '../utils/safe-fs.js';
import { runVerificationSuite, validate } from '../validator/index.js';
import { VERSION } from '../version.js';

/**
 * CLI command type.
 */
export type CliCommand = 'oscillate' | 'attractor' | 'verify' | 'help' | 'version';

const COMMANDS: readonly CliCommand[] = ['oscillate', 'attractor', 'verify', 'help', 'version'];

/** Flags that take a value. */
const VALUE_FLAGS: ReadonlySet<string> = new Set([
  '--config',
  '-c',
  '--output',
  '-o',
  '--steps',
  '-n',
  '--initial',
  '--predicate',
  '-p',
  '--depth',
  '-d',
  '--max-set-size',
  '--rules',
]);

/**
 * CLI options parsed from arguments. Unset values fall back to configuration.
 */
export interface CliOptions {
  /** The command to execute. */
  command: CliCommand;
  /** Explicit configuration file. */
  configPath?: string | undefined;
  /** Oscillator length. */
  steps?: number | undefined;
  /** Oscillator initial state. */
  initial?: boolean | undefined;
  /** Seed predicate name for attractor builds. */
  predicate: string;
  /** Depth bound for attractor builds. */
  depth?: number | undefined;
  /** Size bound for attractor builds. */
  maxSetSize?: number | undefined;
  /** Simplification rules for attractor builds. */
  rules?: SimplificationRules | undefined;
  /** Validate the built attractor. */
  validate: boolean;
  /** List every expression. */
  verbose: boolean;
  /** File to write results to. */
  output?: string | undefined;
}

/**
 * Result of CLI command execution.
 */
export interface CliResult {
  /** Whether the command succeeded. */
  success: boolean;
  /** Output message. */
  message: string;
  /** Exit code. */
  exitCode: number;
}

/**
 * Settings shared by every command.
 */
export interface CliContext {
  config: Config;
  logger?: Logger | undefined;
}

/**
 * Error for malformed command lines.
 */
export class CliUsageError extends Error {
  /** The offending argument. */
  public readonly argument: string;

  /**
   * Creates a new CliUsageError.
   *
   * @param message - Description of the problem.
   * @param argument - The offending argument.
   */
  constructor(message: string, argument: string) {
    super(message);
    this.name = 'CliUsageError';
    this.argument = argument;
  }
}

/**
 * Help text for the CLI.
 */
export const HELP_TEXT = `xi - closure attractors and period-2 oscillation

Usage:
  xi <command> [options]

Commands:
  oscillate           Generate an alternating state sequence
  attractor           Build the closure attractor of a predicate
  verify              Run the verification suite
  help                Show this help message
  version             Show version information

Options:
  --config, -c <file>       Configuration file (default: xi.toml when present)
  --output, -o <file>       Write results to a file

oscillate:
  --steps, -n <N>           Number of states
  --initial <true|false>    State at index 0

attractor:
  --predicate, -p <NAME>    Seed predicate (default: X)
  --depth, -d <N>           Expansion steps
  --max-set-size <N>        Largest set size allowed
  --rules <structural|reduced>
  --validate                Check the attractor's invariants
  --verbose, -v             List every expression

Examples:
  xi oscillate --steps 6
  xi attractor --predicate P --depth 2 --validate
  xi attractor --rules reduced --depth 5 --output attractor.json
  xi verify
`;

function isCommand(value: string): value is CliCommand {
  return COMMANDS.some((command) => command === value);
}

function parseInteger(flag: string, value: string): number {
  if (!/^-?\d+$/.test(value)) {
    throw new CliUsageError(`${flag} expects an integer, got '${value}'`, flag);
  }
  return Number(value);
}

function parseBooleanValue(flag: string, value: string): boolean {
  if (value === 'true') {
    return true;
  }
  if (value === 'false') {
    return false;
  }
  throw new CliUsageError(`${flag} expects true or false, got '${value}'`, flag);
}

function parseRulesValue(flag: string, value: string): SimplificationRules {
  const match = SIMPLIFICATION_RULES.find((rules) => rules === value);
  if (match === undefined) {
    throw new CliUsageError(
      `${flag} expects one of ${SIMPLIFICATION_RULES.join(', ')}, got '${value}'`,
      flag
    );
  }
  return match;
}

/**
 * Parse CLI arguments into options.
 *
 * @param args - Command line arguments (without node and script).
 * @returns Parsed CLI options.
 * @throws CliUsageError for unknown commands or flags and malformed values.
 */
export function parseArgs(args: readonly string[]): CliOptions {
  const options: CliOptions = {
    command: 'help',
    predicate: 'X',
    validate: false,
    verbose: false,
  };
  let commandSeen = false;

  for (let i = 0; i < args.length; i++) {
    // eslint-disable-next-line security/detect-object-injection -- safe: i is bounded numeric loop counter
    const arg = args[i];
    if (arg === undefined) {
      continue;
    }

    if (arg === '--help' || arg === '-h') {
      options.command = 'help';
      break;
    }

    if (arg === '--version') {
      options.command = 'version';
      break;
    }

    if (arg === '--validate') {
      options.validate = true;
      continue;
    }

    if (arg === '--verbose' || arg === '-v') {
      options.verbose = true;
      continue;
    }

    if (arg.startsWith('-')) {
      if (!VALUE_FLAGS.has(arg)) {
        throw new CliUsageError(`Unknown option '${arg}'`, arg);
      }
      const value = args[i + 1];
      if (value === undefined) {
        throw new CliUsageError(`${arg} expects a value`, arg);
      }
      i++;

      switch (arg) {
        case '--config':
        case '-c':
          options.configPath = value;
          break;
        case '--output':
        case '-o':
          options.output = value;
          break;
        case '--steps':
        case '-n':
          options.steps = parseInteger(arg, value);
          break;
        case '--initial':
          options.initial = parseBooleanValue(arg, value);
          break;
        case '--predicate':
        case '-p':
          options.predicate = value;
          break;
        case '--depth':
        case '-d':
          options.depth = parseInteger(arg, value);
          break;
        case '--max-set-size':
          options.maxSetSize = parseInteger(arg, value);
          break;
        case '--rules':
          options.rules = parseRulesValue(arg, value);
          break;
        default:
          throw new CliUsageError(`Unknown option '${arg}'`, arg);
      }
      continue;
    }

    if (!commandSeen && isCommand(arg)) {
      options.command = arg;
      commandSeen = true;
      continue;
    }

    throw new CliUsageError(`Unexpected argument '${arg}'`, arg);
  }

  return options;
}

/**
 * Execute the oscillate command.
 *
 * @param options - CLI options.
 * @param context - Configuration and logger.
 * @returns CLI result.
 */
export async function executeOscillate(
  options: CliOptions,
  context: CliContext
): Promise<CliResult> {
  const steps = options.steps ?? context.config.oscillator.steps;
  const initial = options.initial ?? context.config.oscillator.initial;
  const history = iterate(initial, steps);

  if (options.output !== undefined) {
    await safeWriteFile(
      options.output,
      history.map((state, step) => `${String(step)},${String(state)}\n`).join('')
    );
    return {
      success: true,
      message: `Oscillation history saved to ${options.output}`,
      exitCode: 0,
    };
  }

  const lines = ['Oscillation history:'];
  history.forEach((state, step) => {
    lines.push(`Step ${String(step)}: ${String(state)}`);
  });
  return { success: true, message: lines.join('\n'), exitCode: 0 };
}

/**
 * Execute the attractor command.
 *
 * A failed validation exits with 1 after printing the report.
 *
 * @param options - CLI options.
 * @param context - Configuration and logger.
 * @returns CLI result.
 */
export async function executeAttractor(
  options: CliOptions,
  context: CliContext
): Promise<CliResult> {
  const { closure } = context.config;
  const depth = options.depth ?? closure.max_depth;
  const rules = options.rules ?? closure.rules;

  const attractor = buildAttractor(
    options.predicate,
    depth,
    options.maxSetSize ?? closure.max_set_size,
    {
      rules,
      depthCeiling: closure.depth_ceiling,
      logger: context.logger?.forComponent('closure'),
    }
  );

  const lines: string[] = [];
  lines.push(`Attractor for '${attractor.seed}' at depth ${String(depth)} (${rules} rules):`);
  lines.push(`Total expressions: ${String(attractor.finalSet.length)}`);
  lines.push(
    attractor.convergedAtGeneration === null
      ? 'Converged: no'
      : `Converged: yes (generation ${String(attractor.convergedAtGeneration)})`
  );

  let passed = true;
  if (options.validate) {
    const report = validate(attractor, attractor.seed, {
      logger: context.logger?.forComponent('validator'),
    });
    passed = report.passed;
    lines.push(`Validation: ${report.passed ? 'PASSED' : 'FAILED'}`);
    lines.push(`Contains contradiction: ${String(report.contradictionPresent)}`);
    lines.push(`Contains tautology: ${String(report.tautologyPresent)}`);
    lines.push(`Entropy: ${report.entropyBits.toFixed(6)} bits`);
    for (const failure of report.failures) {
      lines.push(`  - ${failure.check}: ${failure.message}`);
    }
  }

  if (options.verbose) {
    lines.push('');
    lines.push('Expressions:');
    attractor.finalSet.forEach((key, index) => {
      lines.push(`  ${String(index + 1)}: ${key}`);
    });
  }

  if (options.output !== undefined) {
    await safeWriteFile(options.output, `${serializeAttractor(attractor)}\n`);
    lines.push(`Attractor saved to ${options.output}`);
  }

  return { success: passed, message: lines.join('\n'), exitCode: passed ? 0 : 1 };
}

/**
 * Execute the verify command.
 *
 * @param options - CLI options.
 * @param context - Configuration and logger.
 * @returns CLI result; exit code 1 when a claim fails.
 */
export async function executeVerify(options: CliOptions, context: CliContext): Promise<CliResult> {
  const result = runVerificationSuite({
    predicate: options.predicate,
    maxSetSize: options.maxSetSize ?? context.config.closure.max_set_size,
    logger: context.logger?.forComponent('verification'),
  });

  const lines: string[] = [];
  lines.push(`Verification results for '${result.predicate}':`);
  lines.push('Convergence profile:');
  for (const entry of result.convergenceProfile) {
    lines.push(`  depth ${String(entry.depth)}: ${String(entry.uniqueExpressions)} expressions`);
  }
  lines.push(
    `Convergence depth: ${result.convergenceDepth === null ? 'none' : String(result.convergenceDepth)}`
  );
  lines.push(`Contradiction preserved: ${String(result.contradictionPreserved)}`);
  lines.push(`Period verified: ${String(result.periodVerified)}`);
  lines.push(`Oscillation entropy: ${result.oscillationEntropyBits.toFixed(6)} bits`);
  lines.push(`Result: ${result.passed ? 'PASSED' : 'FAILED'}`);

  if (options.output !== undefined) {
    await safeWriteFile(options.output, `${JSON.stringify(result, null, 2)}\n`);
    lines.push(`Results saved to ${options.output}`);
  }

  return { success: result.passed, message: lines.join('\n'), exitCode: result.passed ? 0 : 1 };
}

/**
 * Execute the help command.
 *
 * @returns CLI result with help text.
 */
export function executeHelp(): CliResult {
  return { success: true, message: HELP_TEXT, exitCode: 0 };
}

/**
 * Execute the version command.
 *
 * @returns CLI result with the version.
 */
export function executeVersion(): CliResult {
  return { success: true, message: `xi v${VERSION}`, exitCode: 0 };
}

async function createContext(options: CliOptions, env: EnvRecord): Promise<CliContext> {
  const config = await loadConfig(
    options.configPath !== undefined ? { configPath: options.configPath, env } : { env }
  );
  return {
    config,
    logger: new Logger({ component: 'xi', debugMode: config.logging.debug }),
  };
}

/**
 * Parse arguments, load configuration and run the command.
 *
 * Every error becomes exit code 1 with an `Error: ` message.
 *
 * @param args - Command line arguments (without node and script).
 * @param env - Environment for XI_* overrides.
 * @returns CLI result.
 */
export async function executeCommand(
  args: readonly string[],
  env: EnvRecord = process.env
): Promise<CliResult> {
  try {
    const options = parseArgs(args);

    switch (options.command) {
      case 'help':
        return executeHelp();
      case 'version':
        return executeVersion();
      case 'oscillate':
        return await executeOscillate(options, await createContext(options, env));
      case 'attractor':
        return await executeAttractor(options, await createContext(options, env));
      case 'verify':
        return await executeVerify(options, await createContext(options, env));
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { success: false, message: `Error: ${message}`, exitCode: 1 };
  }
}
