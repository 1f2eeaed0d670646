import {
  EXHAUSTIVE_MAX_STEPS,
  SOLVERS,
  canRunExhaustive,
  runAll,
  runSolver,
} from '../../src/algorithms/runSolver';
import { Grid } from '../../src/models/Grid';
import type { AlgoKey } from '../../src/types/types';
import { parseGrid } from '../../src/utils/textMap/textMap';

describe('runSolver', () => {
  const grid = parseGrid(['.c..', 'cXc.', '.ccc'].join('\n'));
  const algos: AlgoKey[] = ['Exhaustive', 'DynProg'];

  describe('canRunExhaustive()', () => {
    it('accepts the largest diagonal the enumeration allows', () => {
      // Assert
      expect(canRunExhaustive(new Grid(32, 33))).toBe(true);
    });
    it('rejects a 64-step diagonal', () => {
      // Assert
      expect(canRunExhaustive(new Grid(33, 33))).toBe(false);
    });
    it('rejects an empty grid', () => {
      // Assert
      expect(canRunExhaustive(new Grid(0, 4))).toBe(false);
    });
    it('honours a tighter limit', () => {
      // Assert
      expect(canRunExhaustive(new Grid(6, 6), 9)).toBe(false);
    });
    it('never exceeds the enumeration bound', () => {
      // Assert
      expect(canRunExhaustive(new Grid(33, 33), 100)).toBe(false);
    });
  });

  describe('runSolver()', () => {
    it.each(algos)(
      'reports the crane count and steps of the %s path',
      (algo) => {
        // Act
        const result = runSolver(algo, grid);
        // Assert
        expect([result.algo, result.cranes, result.steps]).toEqual([algo, 4, 5]);
      }
    );
    it('measures a non-negative runtime', () => {
      // Act
      const result = runSolver('DynProg', grid);
      // Assert
      expect(result.runtimeMs).toBeGreaterThanOrEqual(0);
    });
  });

  describe('runAll()', () => {
    it('runs both solvers in order when the grid is small', () => {
      // Act
      const { results } = runAll(grid);
      // Assert
      expect(results.map((r) => r.algo)).toEqual(['Exhaustive', 'DynProg']);
    });
    it('reports agreement', () => {
      // Act
      const { agree } = runAll(grid);
      // Assert
      expect(agree).toBe(true);
    });
    it('skips the exhaustive solver past the limit', () => {
      // Act
      const { results, agree } = runAll(grid, 4);
      // Assert
      expect([results.map((r) => r.algo), agree]).toEqual([['DynProg'], null]);
    });
  });

  it('registers one solver per algorithm', () => {
    // Assert
    expect(Object.keys(SOLVERS)).toEqual(algos);
  });

  it('exposes the 63-step enumeration bound', () => {
    // Assert
    expect(EXHAUSTIVE_MAX_STEPS).toBe(63);
  });
});
