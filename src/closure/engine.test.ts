import { describe, expect, it, vi } from 'vitest';
import fc from 'fast-check';
import {
  baseSet,
  contradiction,
  InvalidArgumentError,
  InvalidPredicateError,
  KeyCache,
  literal,
  Predicate,
} from '../algebra/index.js';
import { Logger } from '../utils/logger.js';
import { buildAttractor, DepthLimitError, expandGeneration } from './index.js';

const GENERATION_ONE = [
  'X',
  '¬X',
  '(X∧X)',
  '(X∨X)',
  '(X∧¬X)',
  '(X∨¬X)',
  '(¬X∧¬X)',
  '(¬X∨¬X)',
];

const arbSeed = fc.constantFrom('X', 'P', 'rain', '_q1');

function quietLogger(): Logger {
  const logger = new Logger({ component: 'test', debugMode: true });
  vi.spyOn(logger, 'debug').mockImplementation(() => undefined);
  vi.spyOn(logger, 'info').mockImplementation(() => undefined);
  vi.spyOn(logger, 'warn').mockImplementation(() => undefined);
  return logger;
}

describe('expandGeneration', () => {
  it('yields conjunction, disjunction per base literal, then the negation', () => {
    const p = new Predicate('X');
    const keys = [...expandGeneration([literal(p)], baseSet(p))].map((e) => e.key);

    expect(keys).toEqual(['(X∧X)', '(X∨X)', '(X∧¬X)', '(X∨¬X)', '¬X']);
  });

  it('is empty for an empty snapshot', () => {
    const p = new Predicate('X');
    expect([...expandGeneration([], baseSet(p))]).toEqual([]);
  });
});

describe('buildAttractor', () => {
  describe('structural rules', () => {
    it('returns the base set at depth 0', () => {
      const attractor = buildAttractor('X', 0, 10);

      expect(attractor.finalSet).toEqual(['X', '¬X']);
      expect(attractor.generations).toEqual([['X', '¬X']]);
      expect(attractor.converged).toBe(false);
      expect(attractor.convergedAtGeneration).toBeNull();
    });

    it('builds generation 1 in candidate order', () => {
      const attractor = buildAttractor('X', 1, 100);

      expect(attractor.finalSet).toEqual(GENERATION_ONE);
      expect(attractor.generations).toHaveLength(2);
    });

    it('grows 2, 8, 38, 182', () => {
      const attractor = buildAttractor('X', 3, 1000);

      expect(attractor.generations.map((g) => g.length)).toEqual([2, 8, 38, 182]);
      expect(attractor.finalSet).toHaveLength(182);
      expect(attractor.converged).toBe(false);
    });

    it('records its parameters', () => {
      const attractor = buildAttractor(new Predicate('P'), 2, 500);

      expect(attractor.seed).toBe('P');
      expect(attractor.maxDepth).toBe(2);
      expect(attractor.maxSetSize).toBe(500);
      expect(attractor.rules).toBe('structural');
    });

    it('is frozen', () => {
      const attractor = buildAttractor('X', 1, 100);
      expect(Object.isFrozen(attractor)).toBe(true);
      expect(Object.isFrozen(attractor.generations)).toBe(true);
      expect(Object.isFrozen(attractor.finalSet)).toBe(true);
    });
  });

  describe('reduced rules', () => {
    it('reaches a fixed point at generation 2', () => {
      const attractor = buildAttractor('X', 5, 100, { rules: 'reduced' });

      expect(attractor.generations).toEqual([
        ['X', '¬X'],
        ['X', '¬X', '(X∧¬X)', '(X∨¬X)'],
        ['X', '¬X', '(X∧¬X)', '(X∨¬X)'],
      ]);
      expect(attractor.converged).toBe(true);
      expect(attractor.convergedAtGeneration).toBe(2);
    });

    it('does not claim convergence when the depth runs out first', () => {
      const attractor = buildAttractor('X', 1, 100, { rules: 'reduced' });

      expect(attractor.finalSet).toEqual(['X', '¬X', '(X∧¬X)', '(X∨¬X)']);
      expect(attractor.converged).toBe(false);
    });

    it('converges with four elements for any seed', () => {
      fc.assert(
        fc.property(arbSeed, fc.integer({ min: 2, max: 20 }), (seed, depth) => {
          const attractor = buildAttractor(seed, depth, 100, { rules: 'reduced' });
          expect(attractor.convergedAtGeneration).toBe(2);
          expect(attractor.finalSet).toHaveLength(4);
        })
      );
    });

    it('stays within a tight bound where structural rules do not', () => {
      expect(buildAttractor('X', 50, 4, { rules: 'reduced' }).finalSet).toHaveLength(4);
      expect(() => buildAttractor('X', 50, 4)).toThrow(DepthLimitError);
    });
  });

  describe('invariants', () => {
    it('holds the base elements, unique keys and the contradiction', () => {
      fc.assert(
        fc.property(
          arbSeed,
          fc.integer({ min: 1, max: 2 }),
          fc.constantFrom('structural' as const, 'reduced' as const),
          (seed, depth, rules) => {
            const attractor = buildAttractor(seed, depth, 1000, { rules });
            const keys = new Set(attractor.finalSet);
            const [p, notP] = baseSet(new Predicate(seed));

            expect(keys.size).toBe(attractor.finalSet.length);
            expect(keys.has(p.key)).toBe(true);
            expect(keys.has(notP.key)).toBe(true);
            expect(keys.has(contradiction(new Predicate(seed), { rules }).key)).toBe(true);
          }
        )
      );
    });

    it('grows monotonically, extending each snapshot in order', () => {
      fc.assert(
        fc.property(arbSeed, fc.integer({ min: 0, max: 3 }), (seed, depth) => {
          const { generations } = buildAttractor(seed, depth, 1000);
          for (let i = 1; i < generations.length; i++) {
            const previous = generations[i - 1] ?? [];
            expect(generations[i]?.slice(0, previous.length)).toEqual(previous);
          }
        })
      );
    });

    it('is deterministic', () => {
      expect(buildAttractor('Q', 2, 1000)).toEqual(buildAttractor('Q', 2, 1000));
    });

    it('gives the same result with a shared cache', () => {
      const cache = new KeyCache();
      const first = buildAttractor('X', 2, 1000, { cache });
      const second = buildAttractor('X', 2, 1000, { cache });

      expect(second.finalSet).toEqual(first.finalSet);
      expect(first.finalSet).toEqual(buildAttractor('X', 2, 1000).finalSet);
    });

    it('serves a repeated build from a shared cache', () => {
      const cache = new KeyCache();
      buildAttractor('X', 3, 1000, { cache });
      const { hits, misses } = cache;
      expect(hits).toBeGreaterThan(0);
      expect(misses).toBe(cache.size);

      buildAttractor('X', 3, 1000, { cache });
      expect(cache.misses).toBe(misses);
      expect(cache.hits).toBeGreaterThan(hits);
    });

    it('reuses reduced results across builds', () => {
      const cache = new KeyCache();
      const first = buildAttractor('X', 5, 100, { rules: 'reduced', cache });
      const { misses } = cache;

      const second = buildAttractor('X', 5, 100, { rules: 'reduced', cache });
      expect(second.finalSet).toEqual(first.finalSet);
      expect(cache.misses).toBe(misses);
    });
  });

  describe('bounds', () => {
    it('aborts when the set would outgrow maxSetSize', () => {
      try {
        buildAttractor('X', 50, 4);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(DepthLimitError);
        if (error instanceof DepthLimitError) {
          expect(error.kind).toBe('set_size');
          expect(error.code).toBe('depth_limit');
          expect(error.seed).toBe('X');
          expect(error.attempted).toBe(5);
          expect(error.limit).toBe(4);
          expect(error.generation).toBe(1);
          expect(error.message).toBe(
            "Attractor for 'X' would grow to 5 expressions at generation 1, exceeding maxSetSize 4"
          );
        }
      }
    });

    it('aborts before expansion when the base does not fit', () => {
      expect(() => buildAttractor('X', 0, 1)).toThrow(
        "Attractor for 'X' would grow to 2 expressions at generation 0, exceeding maxSetSize 1"
      );
    });

    it('refuses depths above the ceiling', () => {
      expect(() => buildAttractor('X', 65, 10)).toThrow(
        "Depth 65 for 'X' exceeds the depth ceiling 64"
      );
      expect(() => buildAttractor('X', 3, 10, { depthCeiling: 2 })).toThrow(
        "Depth 3 for 'X' exceeds the depth ceiling 2"
      );
    });

    it('accepts a depth equal to the ceiling', () => {
      expect(buildAttractor('X', 2, 1000, { depthCeiling: 2 }).generations).toHaveLength(3);
    });
  });

  describe('argument validation', () => {
    it('rejects invalid seeds before anything else', () => {
      expect(() => buildAttractor('', -1, 0)).toThrow(InvalidPredicateError);
      expect(() => buildAttractor('True', 1, 10)).toThrow("'True' is a reserved name");
    });

    it('rejects bad depths', () => {
      expect(() => buildAttractor('X', -1, 10)).toThrow('maxDepth must be non-negative, got -1');
      expect(() => buildAttractor('X', 1.5, 10)).toThrow(
        'maxDepth must be an integer, got number 1.5'
      );
    });

    it('rejects bad set sizes', () => {
      expect(() => buildAttractor('X', 1, 0)).toThrow('maxSetSize must be positive, got 0');
      expect(() => buildAttractor('X', 1, Number.NaN)).toThrow(InvalidArgumentError);
    });

    it('rejects a bad ceiling', () => {
      expect(() => buildAttractor('X', 1, 10, { depthCeiling: -1 })).toThrow(
        'depthCeiling must be non-negative, got -1'
      );
    });
  });

  describe('logging', () => {
    it('reports start, each generation and convergence', () => {
      const logger = quietLogger();
      buildAttractor('X', 5, 100, { rules: 'reduced', logger });

      expect(logger.info).toHaveBeenCalledWith('attractor_build_started', {
        seed: 'X',
        maxDepth: 5,
        maxSetSize: 100,
        rules: 'reduced',
      });
      expect(logger.debug).toHaveBeenCalledTimes(2);
      expect(logger.debug).toHaveBeenCalledWith('generation_expanded', {
        seed: 'X',
        generation: 1,
        added: 2,
        size: 4,
      });
      expect(logger.info).toHaveBeenCalledWith('attractor_converged', {
        seed: 'X',
        generation: 2,
        size: 4,
      });
    });

    it('reports an exhausted depth', () => {
      const logger = quietLogger();
      buildAttractor('X', 1, 100, { logger });

      expect(logger.info).toHaveBeenCalledWith('attractor_depth_exhausted', {
        seed: 'X',
        maxDepth: 1,
        size: 8,
      });
    });

    it('warns when the size bound trips', () => {
      const logger = quietLogger();
      expect(() => buildAttractor('X', 50, 4, { logger })).toThrow(DepthLimitError);

      expect(logger.warn).toHaveBeenCalledWith('attractor_bound_exceeded', {
        seed: 'X',
        attempted: 5,
        limit: 4,
        generation: 1,
      });
    });
  });
});
