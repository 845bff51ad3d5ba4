import { readFile } from 'node:fs/promises';
import { performance } from 'node:perf_hooks';
import { InvalidArgumentError, program } from 'commander';
import debug from 'debug';
import { Bench } from 'tinybench';
import { HashRing } from '../src/index.js';
import { countSelections, formatReport } from './report.js';

const log = debug('vnode-ring:bench');

interface BenchOptions {
  nodes: string[];
  vnodeCount: number;
  hash?: string;
  iterations: number;
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('must be a positive integer');
  }
  return parsed;
}

async function readWords(path: string): Promise<string[]> {
  const text = await readFile(path, 'utf8');
  return text.split(/\r?\n/).filter((word) => word.length > 0);
}

async function main(): Promise<void> {
  program
    .name('vnode-ring-bench')
    .description('Builds a ring and reports how the words of a file spread over its nodes')
    .argument('<word-file>', 'file with one key per line')
    .requiredOption('--nodes <ids...>', 'node identifiers')
    .option('--vnode-count <count>', 'virtual nodes per node', parsePositiveInt, 1000)
    .option('--hash <algorithm>', 'node:crypto algorithm instead of murmur3')
    .option('--iterations <count>', 'lookups timed by tinybench', parsePositiveInt, 10_000)
    .parse();

  const [wordFile] = program.args;
  const options = program.opts<BenchOptions>();

  const words = await readWords(wordFile);
  log('read %d words from %s', words.length, wordFile);

  const buildStart = performance.now();
  const ring = HashRing.build(options.nodes, { replicas: options.vnodeCount, hash: options.hash });
  const buildMs = performance.now() - buildStart;
  log('built %s', ring.toString());

  const selectStart = performance.now();
  for (const word of words) {
    ring.lookup(word);
  }
  const selectMs = performance.now() - selectStart;

  const report = formatReport({
    wordCount: words.length,
    realNodes: ring.nodes.length,
    virtualNodes: ring.size,
    replicas: options.vnodeCount,
    counts: countSelections(ring, words),
    buildMs,
    selectMs,
  });
  console.log(report);
  console.log('');

  if (words.length === 0) {
    log('no words, skipping lookup benchmark');
    return;
  }

  const bench = new Bench({ iterations: options.iterations });
  let index = 0;
  bench.add(`lookup (${ring.size} virtual nodes)`, () => {
    ring.lookup(words[index % words.length]);
    index++;
  });
  await bench.run();
  console.table(bench.table());
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
