import { resolve } from 'node:path';
import {
  describe,
  expect,
  it
} from 'vitest';

import {
  DEFAULT_SOLVER_CONFIG,
  loadSolverConfig,
  parseSolverConfig
} from '../src/config.ts';
import { ROOT } from './puzzleTestHelper.ts';

describe('parseSolverConfig', () => {
  it('returns the defaults for an empty document', () => {
    expect(parseSolverConfig('')).toEqual(DEFAULT_SOLVER_CONFIG);
    expect(DEFAULT_SOLVER_CONFIG).toEqual({
      annealing: { coolingRate: 0.99, initialTemperature: 1.15, maxIterations: 500 },
      hillClimbing: { maxIterations: 150 },
      method: 'exact',
      showIfSlowerThanMs: null
    });
  });

  it('merges given fields over the defaults', () => {
    const config = parseSolverConfig([
      'method: hill-climbing',
      'seed: 7',
      'annealing:',
      '  coolingRate: 0.95'
    ].join('\n'));
    expect(config).toEqual({
      annealing: { coolingRate: 0.95, initialTemperature: 1.15, maxIterations: 500 },
      hillClimbing: { maxIterations: 150 },
      method: 'hill-climbing',
      seed: 7,
      showIfSlowerThanMs: null
    });
  });

  it('rejects a document that is not a mapping', () => {
    expect(() => parseSolverConfig('- exact')).toThrow('Solver config must be a mapping');
  });

  it('rejects an unknown method', () => {
    expect(() => parseSolverConfig('method: genetic')).toThrow(
      'method must be one of exact, hill-climbing, simulated-annealing'
    );
  });

  it('rejects a cooling rate outside (0, 1)', () => {
    expect(() => parseSolverConfig('annealing:\n  coolingRate: 1')).toThrow('annealing.coolingRate must be in (0, 1)');
  });

  it('rejects a negative temperature', () => {
    expect(() => parseSolverConfig('annealing:\n  initialTemperature: -1')).toThrow(
      'annealing.initialTemperature must be >= 0'
    );
  });

  it('rejects a fractional iteration cap', () => {
    expect(() => parseSolverConfig('hillClimbing:\n  maxIterations: 1.5')).toThrow(
      'hillClimbing.maxIterations must be a non-negative integer'
    );
    expect(() => parseSolverConfig('annealing:\n  maxIterations: -2')).toThrow(
      'annealing.maxIterations must be a non-negative integer'
    );
  });

  it('rejects a non-numeric field', () => {
    expect(() => parseSolverConfig('annealing:\n  maxIterations: many')).toThrow('annealing.maxIterations must be a number');
  });

  it('rejects a negative display threshold', () => {
    expect(() => parseSolverConfig('showIfSlowerThanMs: -5')).toThrow(
      'showIfSlowerThanMs must be a non-negative number or null'
    );
  });
});

describe('loadSolverConfig', () => {
  it('reads the bundled solver.yaml', () => {
    expect(loadSolverConfig(resolve(ROOT, 'solver.yaml'))).toEqual({
      annealing: { coolingRate: 0.99, initialTemperature: 1.15, maxIterations: 500 },
      hillClimbing: { maxIterations: 150 },
      method: 'simulated-annealing',
      seed: 2024,
      showIfSlowerThanMs: null
    });
  });
});
