import type { HashRing, NodeId } from '../src/index.js';

export interface SelectionReport {
  wordCount: number;
  realNodes: number;
  virtualNodes: number;
  replicas: number;
  counts: ReadonlyMap<NodeId, number>;
  buildMs: number;
  selectMs: number;
}

/**
 * Number of keys each node of the ring owns. Every node is listed, even
 * with a count of 0.
 */
export function countSelections(ring: HashRing, keys: Iterable<string>): Map<NodeId, number> {
  const counts = new Map<NodeId, number>(ring.nodes.map((node) => [node, 0]));
  for (const key of keys) {
    const node = ring.lookup(key);
    counts.set(node, (counts.get(node) ?? 0) + 1);
  }
  return counts;
}

export function formatReport(report: SelectionReport): string {
  const lines = [
    `WORD COUNT: ${report.wordCount}`,
    `REAL NODE COUNT: ${report.realNodes}`,
    `VIRTUAL NODE COUNT: ${report.virtualNodes} (${report.replicas} per node)`,
    '',
    'SELECTED COUNT PER NODE:',
  ];
  for (const [node, count] of report.counts) {
    lines.push(`- ${node}: \t${count}`);
  }

  const wordsPerSecond =
    report.selectMs > 0 ? String(Math.floor((report.wordCount / report.selectMs) * 1000)) : 'n/a';
  lines.push(
    '',
    `ELAPSED: ${Math.floor(report.buildMs)} ms (for building ring), ${Math.floor(report.selectMs)} ms (for selecting nodes)`,
    `WORDS PER SECOND: ${wordsPerSecond}`
  );
  return lines.join('\n');
}
