/**
 * Query Builder Performance Benchmarks
 *
 * Times SQL text generation per dialect and prints one table.
 * Run with: npm run bench
 */

import { performance } from 'perf_hooks';

import { Dialect, QueryBuilder } from '@sqlweave/core';

const WARMUP_RUNS = 200;
const TIMED_RUNS = 10_000;

interface Case {
  group: string;
  label: string;
  run: () => void;
}

interface Row {
  group: string;
  case: string;
  'ops/sec': string;
  'µs/op': string;
}

function measure({ group, label, run }: Case): Row {
  for (let i = 0; i < WARMUP_RUNS; i++) run();

  const start = performance.now();
  for (let i = 0; i < TIMED_RUNS; i++) run();
  const perOpMs = (performance.now() - start) / TIMED_RUNS;

  return {
    group,
    case: label,
    'ops/sec': Math.round(1000 / perOpMs).toLocaleString(),
    'µs/op': (perOpMs * 1000).toFixed(2),
  };
}

const prepared = new QueryBuilder(Dialect.Oracle)
  .select(['id', 'USER'])
  .from('sessions')
  .whereWithPlaceholder([['expires_at', ':now']])
  .setValue(':now', 'SYSTIMESTAMP');

const cases: Case[] = [
  {
    group: 'simple',
    label: 'SELECT * FROM table',
    run: () => new QueryBuilder(Dialect.MariaDB).from('users').render(),
  },
  {
    group: 'simple',
    label: 'four columns',
    run: () =>
      new QueryBuilder(Dialect.MariaDB)
        .select(['id', 'name', 'email', 'created_at'])
        .from('users')
        .render(),
  },
  {
    group: 'simple',
    label: 'two WHERE conditions',
    run: () =>
      new QueryBuilder(Dialect.MariaDB)
        .from('users')
        .where([
          ['active', 'TRUE'],
          ['status', "'verified'"],
        ])
        .render(),
  },
  {
    group: 'placeholders',
    label: 'one token',
    run: () =>
      new QueryBuilder(Dialect.MariaDB)
        .from('users')
        .whereWithPlaceholder([['id', ':id']])
        .setValue(':id', 1)
        .render(),
  },
  {
    group: 'placeholders',
    label: 'twenty tokens',
    run: () => {
      const builder = new QueryBuilder(Dialect.MariaDB).from('users');
      for (let i = 0; i < 20; i++) {
        builder.whereWithPlaceholder([[`col_${i}`, `:p${i}:`]]).setValue(`:p${i}:`, i);
      }
      builder.render();
    },
  },
  ...[Dialect.MariaDB, Dialect.Oracle].map((dialect) => ({
    group: 'full query',
    label: dialect,
    run: () =>
      new QueryBuilder(dialect)
        .select(['id', 'name', 'DATE'])
        .distinct()
        .from('users')
        .useIndex('idx_users_name')
        .innerJoin('orders', 'users.id = orders.user_id')
        .where([['created_at', '2024-01-01 00:00:00']], true)
        .orderBy('name')
        .limit(10)
        .offset(20)
        .render(),
  })),
  {
    group: 'reuse',
    label: 'render() on a prepared builder',
    run: () => prepared.render(),
  },
];

console.log(`sqlweave benchmarks: ${TIMED_RUNS.toLocaleString()} runs per case\n`);
console.table(cases.map(measure));
