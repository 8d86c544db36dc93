import { afterAll, beforeAll, beforeEach, afterEach, describe, expect, it, vi } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { buildAttractor, deserializeAttractor } from '../closure/index.js';
import { getDefaultConfig } from '../config/index.js';
import { Logger } from '../utils/logger.js';
import {
  CliUsageError,
  executeAttractor,
  executeCommand,
  executeOscillate,
  executeVerify,
  HELP_TEXT,
  parseArgs,
  type CliContext,
} from './cli.js';

function context(): CliContext {
  return { config: getDefaultConfig() };
}

describe('parseArgs', () => {
  it('defaults to help', () => {
    expect(parseArgs([])).toEqual({
      command: 'help',
      predicate: 'X',
      validate: false,
      verbose: false,
    });
  });

  it('reads attractor options', () => {
    expect(
      parseArgs([
        'attractor',
        '-p',
        'Rain',
        '--depth',
        '2',
        '--max-set-size',
        '50',
        '--rules',
        'reduced',
        '--validate',
        '-v',
        '-o',
        'out.json',
      ])
    ).toEqual({
      command: 'attractor',
      predicate: 'Rain',
      depth: 2,
      maxSetSize: 50,
      rules: 'reduced',
      validate: true,
      verbose: true,
      output: 'out.json',
    });
  });

  it('reads oscillate options', () => {
    const options = parseArgs(['oscillate', '--steps', '4', '--initial', 'false']);
    expect(options.command).toBe('oscillate');
    expect(options.steps).toBe(4);
    expect(options.initial).toBe(false);
  });

  it('reads the config path', () => {
    expect(parseArgs(['verify', '--config', 'alt.toml']).configPath).toBe('alt.toml');
  });

  it('keeps negative numbers for the commands to reject', () => {
    expect(parseArgs(['attractor', '--depth', '-1']).depth).toBe(-1);
  });

  it('stops at --help and --version', () => {
    expect(parseArgs(['attractor', '--help', '--bogus']).command).toBe('help');
    expect(parseArgs(['--version']).command).toBe('version');
  });

  it('rejects unknown options', () => {
    expect(() => parseArgs(['attractor', '--frobnicate'])).toThrow(
      "Unknown option '--frobnicate'"
    );
  });

  it('rejects missing and malformed values', () => {
    expect(() => parseArgs(['attractor', '--depth'])).toThrow('--depth expects a value');
    expect(() => parseArgs(['attractor', '--depth', 'two'])).toThrow(
      "--depth expects an integer, got 'two'"
    );
    expect(() => parseArgs(['oscillate', '--initial', 'yes'])).toThrow(
      "--initial expects true or false, got 'yes'"
    );
    expect(() => parseArgs(['attractor', '--rules', 'full'])).toThrow(
      "--rules expects one of structural, reduced, got 'full'"
    );
  });

  it('rejects stray arguments', () => {
    expect(() => parseArgs(['attractor', 'verify'])).toThrow(CliUsageError);
    expect(() => parseArgs(['bogus'])).toThrow("Unexpected argument 'bogus'");
  });
});

describe('commands', () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'xi-cli-'));
  });

  afterAll(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  beforeEach(() => {
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('executeOscillate', () => {
    it('prints the history', async () => {
      const result = await executeOscillate(parseArgs(['oscillate', '--steps', '3']), context());

      expect(result).toEqual({
        success: true,
        message: 'Oscillation history:\nStep 0: true\nStep 1: false\nStep 2: true',
        exitCode: 0,
      });
    });

    it('uses the configured defaults', async () => {
      const ctx = context();
      ctx.config.oscillator = { steps: 2, initial: false };

      const result = await executeOscillate(parseArgs(['oscillate']), ctx);
      expect(result.message).toBe('Oscillation history:\nStep 0: false\nStep 1: true');
    });

    it('writes step,state lines to a file', async () => {
      const file = join(tempDir, 'oscillation.csv');
      const result = await executeOscillate(
        parseArgs(['oscillate', '-n', '3', '-o', file]),
        context()
      );

      expect(result.message).toBe(`Oscillation history saved to ${file}`);
      expect(await readFile(file, 'utf-8')).toBe('0,true\n1,false\n2,true\n');
    });
  });

  describe('executeAttractor', () => {
    it('logs each stage under its own component', async () => {
      const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
      const logger = new Logger({ component: 'xi' });

      await executeAttractor(parseArgs(['attractor', '--depth', '1', '--validate']), {
        config: getDefaultConfig(),
        logger,
      });

      const components = write.mock.calls.map(
        ([chunk]) => /"component":"([a-z]+)"/.exec(String(chunk))?.[1]
      );
      expect(components).toEqual(['closure', 'closure', 'validator']);
    });

    it('prints a summary', async () => {
      const result = await executeAttractor(parseArgs(['attractor', '--depth', '1']), context());

      expect(result).toEqual({
        success: true,
        message: "Attractor for 'X' at depth 1 (structural rules):\nTotal expressions: 8\nConverged: no",
        exitCode: 0,
      });
    });

    it('prints validation results', async () => {
      const result = await executeAttractor(
        parseArgs(['attractor', '-d', '1', '--validate']),
        context()
      );

      expect(result.message.split('\n').slice(3)).toEqual([
        'Validation: PASSED',
        'Contains contradiction: true',
        'Contains tautology: true',
        'Entropy: 1.000000 bits',
      ]);
    });

    it('reports convergence and lists expressions', async () => {
      const result = await executeAttractor(
        parseArgs(['attractor', '--rules', 'reduced', '--verbose']),
        context()
      );

      expect(result.message).toBe(
        [
          "Attractor for 'X' at depth 3 (reduced rules):",
          'Total expressions: 4',
          'Converged: yes (generation 2)',
          '',
          'Expressions:',
          '  1: X',
          '  2: ¬X',
          '  3: (X∧¬X)',
          '  4: (X∨¬X)',
        ].join('\n')
      );
    });

    it('saves the serialized attractor', async () => {
      const file = join(tempDir, 'attractor.json');
      const result = await executeAttractor(
        parseArgs(['attractor', '-p', 'P', '-d', '2', '-o', file]),
        context()
      );

      expect(result.message.endsWith(`Attractor saved to ${file}`)).toBe(true);
      expect(deserializeAttractor(await readFile(file, 'utf-8'))).toEqual(
        buildAttractor('P', 2, 10000)
      );
    });
  });

  describe('executeVerify', () => {
    it('logs the suite outcome as verification', async () => {
      const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

      await executeVerify(parseArgs(['verify']), {
        config: getDefaultConfig(),
        logger: new Logger({ component: 'xi' }),
      });

      expect(write).toHaveBeenCalledTimes(1);
      expect(String(write.mock.calls[0]?.[0])).toContain(
        '"component":"verification","event":"verification_completed"'
      );
    });

    it('prints the verification results', async () => {
      const result = await executeVerify(parseArgs(['verify']), context());

      expect(result.exitCode).toBe(0);
      expect(result.message).toBe(
        [
          "Verification results for 'X':",
          'Convergence profile:',
          '  depth 1: 4 expressions',
          '  depth 2: 4 expressions',
          'Convergence depth: 2',
          'Contradiction preserved: true',
          'Period verified: true',
          'Oscillation entropy: 1.000000 bits',
          'Result: PASSED',
        ].join('\n')
      );
    });

    it('saves the results as JSON', async () => {
      const file = join(tempDir, 'verify.json');
      await executeVerify(parseArgs(['verify', '--output', file]), context());

      const saved: unknown = JSON.parse(await readFile(file, 'utf-8'));
      expect(saved).toMatchObject({ predicate: 'X', convergenceDepth: 2, passed: true });
    });
  });

  describe('executeCommand', () => {
    it('answers help and version without configuration', async () => {
      expect(await executeCommand([], {})).toEqual({
        success: true,
        message: HELP_TEXT,
        exitCode: 0,
      });
      expect((await executeCommand(['version'], {})).message).toBe('xi v0.1.0');
    });

    it('applies environment overrides', async () => {
      const result = await executeCommand(['attractor'], { XI_CLOSURE_RULES: 'reduced' });

      expect(result.exitCode).toBe(0);
      expect(result.message.split('\n')[0]).toBe("Attractor for 'X' at depth 3 (reduced rules):");
    });

    it('reads an explicit config file', async () => {
      const file = join(tempDir, 'xi.toml');
      await writeFile(file, '[closure]\nmax_depth = 1\n\n[oscillator]\nsteps = 2\n');

      const attractor = await executeCommand(['attractor', '--config', file], {});
      const oscillate = await executeCommand(['oscillate', '-c', file], {});

      expect(attractor.message.split('\n')[1]).toBe('Total expressions: 8');
      expect(oscillate.message).toBe('Oscillation history:\nStep 0: true\nStep 1: false');
    });

    it('turns errors into exit code 1', async () => {
      expect(await executeCommand(['attractor', '--depth', '-1'], {})).toEqual({
        success: false,
        message: 'Error: maxDepth must be non-negative, got -1',
        exitCode: 1,
      });
      expect((await executeCommand(['attractor', '-d', '65'], {})).message).toBe(
        "Error: Depth 65 for 'X' exceeds the depth ceiling 64"
      );
      expect(
        (await executeCommand(['attractor', '-d', '5', '--max-set-size', '10'], {})).message
      ).toBe(
        "Error: Attractor for 'X' would grow to 11 expressions at generation 2, exceeding maxSetSize 10"
      );
      expect((await executeCommand(['attractor', '-p', 'not'], {})).message).toBe(
        "Error: 'not' is a reserved name"
      );
      expect((await executeCommand(['bogus'], {})).message).toBe(
        "Error: Unexpected argument 'bogus'"
      );
    });

    it('reports configuration problems', async () => {
      const missing = join(tempDir, 'missing.toml');

      expect((await executeCommand(['verify', '-c', missing], {})).message).toBe(
        `Error: Config file not found: ${missing}`
      );
      expect((await executeCommand(['verify'], { XI_DEPTH: 'deep' })).exitCode).toBe(1);
    });
  });
});
