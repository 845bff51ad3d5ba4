import { describe, expect, test } from 'vitest';
import { countSelections, formatReport } from '../benchmark/report.js';
import { HashRing } from '../src/index.js';
import { stubHash, vnodeLabel } from './test-utils.js';

const positions = new Map<string, number>([
  [vnodeLabel('A', 0), 10],
  [vnodeLabel('B', 0), 30],
  ['k5', 5],
  ['k20', 20],
  ['k200', 200],
]);

describe('countSelections()', () => {
  test('counts the owner of each key', () => {
    const ring = HashRing.build(['A', 'B'], { replicas: 1, hash: stubHash(positions) });
    expect(countSelections(ring, ['k5', 'k20', 'k200'])).toEqual(
      new Map([
        ['A', 2],
        ['B', 1],
      ])
    );
  });

  test('lists nodes that own no keys', () => {
    const ring = HashRing.build(['A', 'B'], { replicas: 1, hash: stubHash(positions) });
    expect([...countSelections(ring, ['k5'])]).toEqual([
      ['A', 1],
      ['B', 0],
    ]);
  });
});

describe('formatReport()', () => {
  test('prints counts, timings and throughput', () => {
    const output = formatReport({
      wordCount: 3,
      realNodes: 2,
      virtualNodes: 6,
      replicas: 3,
      counts: new Map([
        ['A', 2],
        ['B', 1],
      ]),
      buildMs: 1.7,
      selectMs: 2,
    });

    expect(output.split('\n')).toEqual([
      'WORD COUNT: 3',
      'REAL NODE COUNT: 2',
      'VIRTUAL NODE COUNT: 6 (3 per node)',
      '',
      'SELECTED COUNT PER NODE:',
      '- A: \t2',
      '- B: \t1',
      '',
      'ELAPSED: 1 ms (for building ring), 2 ms (for selecting nodes)',
      'WORDS PER SECOND: 1500',
    ]);
  });

  test('reports throughput as n/a when selection took no time', () => {
    const output = formatReport({
      wordCount: 0,
      realNodes: 1,
      virtualNodes: 1,
      replicas: 1,
      counts: new Map([['A', 0]]),
      buildMs: 0,
      selectMs: 0,
    });
    expect(output.split('\n').at(-1)).toBe('WORDS PER SECOND: n/a');
  });
});
