/**
 * Example flows.
 *
 *   npm run cli -- graph examples/numbers.flow.ts --flow numbers
 *   npm run cli -- run examples/numbers.flow.ts --flow numbers -p count=5
 *   npm run cli -- compile examples/numbers.flow.ts --flow nightly-report
 */

import { flow, step } from '../src/index.js';

export const getItems = step(
  function get_items(_input: unknown, params) {
    const count = typeof params.count === 'number' ? params.count : 3;
    return Array.from({ length: count }, (_, index) => index + 1);
  },
  { params: ['count'] }
);

export const double = step('double', function (value: number) {
  return value * 2;
});

export const addOne = step(function add_one(value: number) {
  return value + 1;
});

export const sum = step('sum', function (values: number[]) {
  return values.reduce((total, value) => total + value, 0);
});

export const report = step(
  'report',
  (total: number, params) => `${String(params.label ?? 'total')}: ${total}`,
  { params: ['label'], retry: { maxRetries: 2, initialDelay: '2s', backoffMultiplier: 2 } }
);

export const crunch = step(
  'crunch',
  (values: number[]) => values.map(value => value ** 2),
  { job: { type: 'heavyweight', vcpu: 4, memoryMb: 8192 } }
);

/** get_items → double (per element) → sum */
export const numbers = flow('numbers', () => getItems.map(double).agg(sum));

/** get_items → add_one → double (per element, at most 2 at a time) → sum → report */
export const nightlyReport = flow(
  'nightlyReport',
  () => getItems.map(addOne, { concurrencyLimit: 2 }).next(double).agg(sum).next(report),
  { schedule: 'cron(0 6 * * ? *)' }
);

/** A heavyweight step between a fan-out and a linear tail */
export const squares = flow('squares', () => getItems.next(crunch).map(double).agg(sum));
