/*
 * Benchmark parsing and rendering templates.
 *
 * Notes:
 * - This is a micro-benchmark. Results vary by machine and Node.js version.
 * - Usage: tsx scripts/bench.ts [--iterations=N] [--warmup=N] [--format=table|json]
 */

import { performance } from 'node:perf_hooks';

import { tplParse, tplRenderNodes } from '../src/template-parser.js';
import { tplChainFrom } from '../src/context-chain.js';
import type { TplNode, TplRenderEnv } from '../src/types.js';

type BenchmarkKind = 'parse' | 'render' | 'parse+render';

interface BenchmarkResult {
  kind: BenchmarkKind;
  scenario: string;
  iterations: number;
  totalMs: number;
  msPerOp: number;
  opsPerSec: number;
}

interface Scenario {
  name: string;
  template: string;
  data: Record<string, unknown>;
}

interface BenchArgs {
  iterations: number;
  warmup: number;
  format: 'table' | 'json';
}

function parseArgs (argv: string[]): BenchArgs {
  const out: BenchArgs = {
    iterations: 20_000,
    warmup: 2_000,
    format: 'table',
  };

  for (const arg of argv) {
    const m = /^--(iterations|warmup)=(\d+)$/.exec(arg);
    if (m) {
      const value = Number.parseInt(m[2] ?? '', 10);
      if (!Number.isFinite(value)) continue;
      if (m[1] === 'iterations') out.iterations = Math.max(1, Math.min(value, 2_000_000));
      if (m[1] === 'warmup') out.warmup = Math.min(value, 200_000);
    }
    if (arg === '--format=json') out.format = 'json';
  }

  return out;
}

/**
 * Diagnostics are not expected in the benchmark scenarios; fail loudly if one appears.
 */
const env: TplRenderEnv = {
  report: (d) => {
    throw new Error(`unexpected diagnostic: ${d.message}`);
  },
};

/**
 * Time `op` over `iterations` runs after `warmup` untimed runs.
 */
function measure (kind: BenchmarkKind, scenario: string, iterations: number, warmup: number, op: () => number): BenchmarkResult {
  let sink = 0;
  for (let i = 0; i < warmup; i++) sink += op();

  const start = performance.now();
  for (let i = 0; i < iterations; i++) sink += op();
  const totalMs = performance.now() - start;

  if (sink === Number.NEGATIVE_INFINITY) {
    // Prevent DCE in case of overly aggressive optimizations.
    console.log('sink', sink);
  }

  return {
    kind,
    scenario,
    iterations,
    totalMs,
    msPerOp: totalMs / iterations,
    opsPerSec: (iterations / totalMs) * 1000,
  };
}

function main (): void {
  const args = parseArgs(process.argv.slice(2));

  const scenarios: Scenario[] = [
    {
      name: 'small (variables)',
      template: 'Hello {{ name }}, you have {{{ count }}} new messages!\n',
      data: { name: '<Alice>', count: 3 },
    },
    {
      name: 'medium (sections)',
      template: [
        '{{#user.admin}}Admin{{/user.admin}}{{^user.admin}}User{{/user.admin}}\n',
        '{{#items}}\n',
        '- {{ title }} ({{ count }})\n',
        '{{/items}}\n',
      ].join(''),
      data: {
        user: { admin: true },
        items: [
          { title: 'Foo', count: 1 },
          { title: 'Bar & Baz', count: 2 },
          { title: 'Qux', count: 0 },
        ],
      },
    },
    {
      name: 'large (many variables)',
      template: Array.from({ length: 80 }, (_, i) => `Row ${i}: {{ user.name }} - {{ user.email }}\n`).join(''),
      data: { user: { name: 'Alice', email: 'alice@example.test' } },
    },
  ];

  const results: BenchmarkResult[] = [];

  for (const scenario of scenarios) {
    const nodes: readonly TplNode[] = tplParse(scenario.template);
    const chain = tplChainFrom([ scenario.data ]);

    results.push(
      measure('parse', scenario.name, args.iterations, args.warmup, () => tplParse(scenario.template).length),
      measure('render', scenario.name, args.iterations, args.warmup, () => tplRenderNodes(nodes, chain, env).length),
      measure('parse+render', scenario.name, args.iterations, args.warmup,
        () => tplRenderNodes(tplParse(scenario.template), tplChainFrom([ scenario.data ]), env).length),
    );
  }

  const rows = results.map((r) => ({
    kind: r.kind,
    scenario: r.scenario,
    iterations: r.iterations,
    totalMs: Number(r.totalMs.toFixed(2)),
    msPerOp: Number(r.msPerOp.toFixed(6)),
    opsPerSec: Number(r.opsPerSec.toFixed(0)),
  }));

  if (args.format === 'json') {
    console.log(JSON.stringify({ node: process.version, params: args, results: rows }));
    return;
  }

  console.log('Template benchmark');
  console.log(`Node: ${process.version}`);
  console.log(`iterations=${args.iterations} warmup=${args.warmup}`);
  console.log('');
  console.table(rows);
}

main();
