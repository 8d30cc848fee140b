import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { setTimeout as wait } from 'timers/promises';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { step } from '../src/steps/step.js';
import { flow } from '../src/flow.js';
import { FlowExecutor, runFlow } from '../src/runtime/FlowExecutor.js';
import { getFailureDetails } from '../src/runtime/StepExecutor.js';
import { StoreError } from '../src/errors.js';
import { LocalStore } from '../src/store/LocalStore.js';
import { createInstantSleep, createMockLogger } from './helpers/test-utils.js';

const getItems = step(
  function get_items(_input: unknown, params) {
    const count = typeof params.count === 'number' ? params.count : 3;
    return Array.from({ length: count }, (_, i) => i + 1);
  },
  { params: ['count'] }
);
const double = step('double', function (x: number) {
  return x * 2;
});
const addOne = step(function add_one(x: number) {
  return x + 1;
});
const sum = step('sum', function (values: number[]) {
  return values.reduce((a, b) => a + b, 0);
});
const scale = step('scale', function (x: number, params) {
  return x * Number(params.factor);
});

class Point {
  constructor(
    readonly x: number,
    readonly y: number
  ) {}

  norm(): number {
    return Math.abs(this.x) + Math.abs(this.y);
  }
}

describe('runFlow', () => {
  let logger: ReturnType<typeof createMockLogger>;

  beforeEach(() => {
    logger = createMockLogger();
  });

  it('fans out, applies the per-element step and aggregates', async () => {
    const numbers = flow('numbers', () => getItems.map(double).agg(sum));
    await expect(runFlow(numbers(), {}, { logger })).resolves.toBe(12);
  });

  it('runs linear chains in order', async () => {
    const first = step('first', () => 'a');
    const second = step('second', (s: string) => `${s}b`);
    const third = step('third', (s: string) => `${s}c`);
    const letters = flow('letters', () => first.next(second).next(third));

    await expect(runFlow(letters(), {}, { logger })).resolves.toBe('abc');
  });

  it('chains several per-element steps before aggregating', async () => {
    const pipeline = flow('pipeline', () => getItems.map(addOne).next(double).agg(sum));
    await expect(runFlow(pipeline(), {}, { logger })).resolves.toBe(18);
  });

  it('passes the declared flow parameters', async () => {
    const numbers = flow('numbers', () => getItems.map(double).agg(sum));
    await expect(runFlow(numbers(), { count: 4 }, { logger })).resolves.toBe(20);
  });

  it('withholds parameters a step did not declare', async () => {
    const seen: Record<string, unknown>[] = [];
    const peek = step('peek', (x: number, params) => {
      seen.push(params);
      return x;
    });
    const peeking = flow('peeking', () => sum.invoke([1, 2]).next(peek));

    await runFlow(peeking(), { count: 4, secret: 'test-secret' }, { logger });
    expect(seen).toEqual([{}]);
  });

  it('passes every parameter to a step selecting all of them', async () => {
    const seen: Record<string, unknown>[] = [];
    const peekAll = step(
      'peek_all',
      (x: number, params) => {
        seen.push(params);
        return x;
      },
      { params: '*' }
    );
    const peeking = flow('peeking', () => sum.invoke([1, 2]).next(peekAll));

    await runFlow(peeking(), { count: 4, mode: 'full' }, { logger });
    expect(seen).toEqual([{ count: 4, mode: 'full' }]);
  });

  it('overlays parameters bound at link time', async () => {
    const scaled = flow('scaled', () => getItems.map(double).agg(sum).next(scale, { factor: 3 }));
    await expect(runFlow(scaled(), {}, { logger })).resolves.toBe(36);
  });

  it('binds parameters to per-element steps through map options', async () => {
    const scaled = flow('scaled', () => getItems.map(scale, { params: { factor: 10 } }).agg(sum));
    await expect(runFlow(scaled(), {}, { logger })).resolves.toBe(60);
  });

  it('feeds the input captured by invoke to the head step', async () => {
    const answer = flow('answer', () => double.invoke(21));
    await expect(runFlow(answer(), {}, { logger })).resolves.toBe(42);
  });

  it('passes invoke parameters to the head step', async () => {
    const greet = step('greet', (name: string, params) => `${String(params.greeting)} ${name}`);
    const greeting = flow('greeting', () => greet.invoke('ada', { greeting: 'hi' }));

    await expect(runFlow(greeting(), {}, { logger })).resolves.toBe('hi ada');
  });

  it('aggregates per-element results in element order', async () => {
    const late = step('late', async (x: number) => {
      await wait((4 - x) * 5);
      return x * 10;
    });
    const collect = step('collect', (values: number[]) => values);
    const ordered = flow('ordered', () => getItems.map(late).agg(collect));

    await expect(runFlow(ordered(), {}, { logger })).resolves.toEqual([10, 20, 30]);
  });

  it('aggregates an empty sequence', async () => {
    const none = step('none', (): number[] => []);
    const empty = flow('empty', () => none.map(double).agg(sum));

    await expect(runFlow(empty(), {}, { logger })).resolves.toBe(0);
  });

  it('runs consecutive fan-out regions', async () => {
    const again = step('again', (total: number) => [total, total + 1]);
    const total = step('total', (values: number[]) => values.reduce((a, b) => a + b, 0));
    const twice = flow('twice', () => getItems.map(double).agg(sum).next(again).map(addOne).agg(total));

    // 12 -> [12, 13] -> [13, 14] -> 27
    await expect(runFlow(twice(), {}, { logger })).resolves.toBe(27);
  });

  it('bounds in-flight elements by the concurrency limit', async () => {
    let inFlight = 0;
    let peak = 0;
    const tracked = step('tracked', async (x: number) => {
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      await wait(5);
      inFlight -= 1;
      return x;
    });
    const bounded = flow('bounded', () => getItems.map(tracked, { concurrencyLimit: 2 }).agg(sum));

    await expect(runFlow(bounded(), { count: 6 }, { logger })).resolves.toBe(21);
    expect(peak).toBe(2);
  });

  it('falls back to maxWorkers when the fan-out sets no limit', async () => {
    let inFlight = 0;
    let peak = 0;
    const tracked = step('tracked', async (x: number) => {
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      await wait(5);
      inFlight -= 1;
      return x;
    });
    const unbounded = flow('unbounded', () => getItems.map(tracked).agg(sum));

    await runFlow(unbounded(), { count: 5 }, { logger, maxWorkers: 1 });
    expect(peak).toBe(1);
  });

  it('rejects a fan-out over a value that is not an array', async () => {
    const one = step('one', () => 5);
    const scalar = flow('scalar', () => one.map(double).agg(sum));

    const error: unknown = await runFlow(scalar(), {}, { logger }).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(StoreError);
    if (error instanceof StoreError) {
      expect(error.code).toBe('NOT_FOUND');
      expect(error.message).toBe("Step 'one' did not return an array, so there is nothing to fan out");
    }
  });

  it('hands class instances to the next step intact', async () => {
    const make = step('make', () => new Point(-3, 4));
    const use = step('use', (point: Point) => point.norm());
    const measured = flow('measured', () => make.next(use));

    await expect(runFlow(measured(), {}, { logger })).resolves.toBe(7);
  });

  it('keeps class instances intact across fan-out waves', async () => {
    const points = step('points', () => [new Point(1, -1), new Point(-2, 0)]);
    const shift = step('shift', (point: Point) => new Point(point.x + 1, point.y));
    const measure = step('measure', (point: Point) => point.norm());
    const shifted = flow('shifted', () => points.map(shift).next(measure).agg(sum));

    // (2, -1) -> 3, (-1, 0) -> 1
    await expect(runFlow(shifted(), {}, { logger })).resolves.toBe(4);
  });

  it('follows the dependency graph from producers to consumers', async () => {
    const numbers = flow('numbers', () => getItems.map(double).agg(sum).next(scale, { factor: 2 }));
    await runFlow(numbers(), {}, { logger });

    const debug = logger.calls.filter(call => call.level === 'debug').map(call => call.message);
    expect(debug).toContain('Step order: get_items -> double -> sum -> scale');
  });

  it('logs the run and every step', async () => {
    const numbers = flow('numbers', () => getItems.map(double).agg(sum));
    await runFlow(numbers(), {}, { logger, runId: 'run-1' });

    const messages = logger.calls.filter(call => call.level === 'info').map(call => call.message);
    expect(messages[0]).toBe("Starting flow 'numbers' (run_id=run-1)");
    expect(messages).toContain("Step 'get_items' started");
    expect(messages).toContain("Fan-out 'double' started (3 items)");
    expect(messages).toContain("Step 'sum' started");
    expect(messages[messages.length - 1]).toBe("Flow 'numbers' completed");
  });
});

describe('retries', () => {
  it('retries a failing step and succeeds', async () => {
    const logger = createMockLogger();
    const sleep = createInstantSleep();
    let calls = 0;
    const flaky = step(
      'flaky',
      () => {
        calls += 1;
        if (calls === 1) {
          throw new Error('transient');
        }
        return 'ok';
      },
      { retry: { maxRetries: 1 } }
    );
    const retrying = flow('retrying', () => flaky.invoke());

    await expect(runFlow(retrying(), {}, { logger, sleep })).resolves.toBe('ok');
    expect(calls).toBe(2);
    expect(sleep.delays).toEqual([1000]);
    expect(logger.calls.filter(call => call.level === 'warn').map(call => call.message)).toEqual([
      "Step 'flaky' failed (attempt 1/2), retrying in 1.0s",
    ]);
  });

  it('backs off between attempts and rethrows the last error', async () => {
    const sleep = createInstantSleep();
    const failure = new Error('still broken');
    const broken = step(
      'broken',
      () => {
        throw failure;
      },
      { retry: { maxRetries: 2, initialDelay: 1, backoffMultiplier: 2 } }
    );
    const failing = flow('failing', () => broken.invoke());

    const error: unknown = await runFlow(failing(), {}, { logger: createMockLogger(), sleep }).catch(
      (e: unknown) => e
    );
    expect(error).toBe(failure);
    expect(sleep.delays).toEqual([1000, 2000]);
    expect(getFailureDetails(error)).toMatchObject({ step: 'broken', attempts: 3 });
  });

  it('does not retry errors outside retryOn', async () => {
    const sleep = createInstantSleep();
    const failure = new TypeError('wrong shape');
    let calls = 0;
    const picky = step(
      'picky',
      () => {
        calls += 1;
        throw failure;
      },
      { retry: { maxRetries: 3, retryOn: ['TransientError'] } }
    );
    const failing = flow('failing', () => picky.invoke());

    await expect(runFlow(failing(), {}, { logger: createMockLogger(), sleep })).rejects.toBe(failure);
    expect(calls).toBe(1);
    expect(sleep.delays).toEqual([]);
    expect(getFailureDetails(failure)).toMatchObject({ step: 'picky', attempts: 1 });
  });

  it('applies the configured default policy to steps without one', async () => {
    const sleep = createInstantSleep();
    let calls = 0;
    const once = step('once', () => {
      calls += 1;
      if (calls === 1) {
        throw new Error('first call fails');
      }
      return calls;
    });
    const retrying = flow('retrying', () => once.invoke());

    await expect(
      runFlow(retrying(), {}, { logger: createMockLogger(), sleep, config: { retry: { maxRetries: 1, initialDelay: '250ms' } } })
    ).resolves.toBe(2);
    expect(sleep.delays).toEqual([250]);
  });

  it('lets every element settle before rethrowing an element failure', async () => {
    const seen: number[] = [];
    const explode = step('explode', (x: number) => {
      seen.push(x);
      if (x === 2) {
        throw new Error('bad element');
      }
      return x;
    });
    const failing = flow('failing', () => getItems.map(explode, { concurrencyLimit: 1 }).agg(sum));

    const error: unknown = await runFlow(failing(), {}, { logger: createMockLogger() }).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(Error);
    if (error instanceof Error) {
      expect(error.message).toBe('bad element');
    }
    expect(seen).toEqual([1, 2, 3]);
    expect(getFailureDetails(error)).toMatchObject({ step: 'explode[1]', attempts: 1 });
  });

  it('retries elements one by one', async () => {
    const sleep = createInstantSleep();
    const attempts = new Map<number, number>();
    const wobbly = step(
      'wobbly',
      (x: number) => {
        const count = (attempts.get(x) ?? 0) + 1;
        attempts.set(x, count);
        if (x === 3 && count === 1) {
          throw new Error('element 3 hiccup');
        }
        return x;
      },
      { retry: { maxRetries: 1 } }
    );
    const retrying = flow('retrying', () => getItems.map(wobbly).agg(sum));

    await expect(runFlow(retrying(), {}, { logger: createMockLogger(), sleep })).resolves.toBe(6);
    expect(Object.fromEntries(attempts)).toEqual({ 1: 1, 2: 1, 3: 2 });
    expect(sleep.delays).toEqual([1000]);
  });
});

describe('FlowExecutor', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'stepline-test-'));
  });

  afterEach(async () => {
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  it('generates a local run id', () => {
    const numbers = flow('numbers', () => getItems.map(double).agg(sum));
    const executor = new FlowExecutor(numbers(), { logger: createMockLogger() });
    expect(executor.runId).toMatch(/^local-[0-9a-f-]{36}$/);
  });

  it('removes the run directory from a configured store afterwards', async () => {
    const numbers = flow('numbers', () => getItems.map(double).agg(sum));
    await runFlow(numbers(), {}, { logger: createMockLogger(), runId: 'run-1', config: { local: { storeDir: dir } } });

    expect(fs.existsSync(path.join(dir, 'numbers', 'run-1'))).toBe(false);
    expect(fs.existsSync(dir)).toBe(true);
  });

  it('keeps intermediate values when asked', async () => {
    const logger = createMockLogger();
    const numbers = flow('numbers', () => getItems.map(double).agg(sum));
    await runFlow(numbers(), {}, {
      logger,
      runId: 'run-1',
      keepIntermediate: true,
      config: { local: { storeDir: dir } },
    });

    const runDir = path.join(dir, 'numbers', 'run-1');
    expect(fs.existsSync(path.join(runDir, 'get_items', 'output.bin.gz'))).toBe(true);
    expect(fs.existsSync(path.join(runDir, 'get_items', 'map_manifest.json'))).toBe(true);
    expect(fs.existsSync(path.join(runDir, 'double', '2', 'output.bin.gz'))).toBe(true);
    expect(fs.existsSync(path.join(runDir, 'sum', 'output.bin.gz'))).toBe(true);
    expect(logger.calls.map(call => call.message)).toContain(`Intermediate values kept under ${dir}`);
  });

  it('cleans up after a failed run', async () => {
    const failing = flow('failing', () =>
      getItems.next(
        step('crash', () => {
          throw new Error('crash');
        })
      )
    );

    await expect(
      runFlow(failing(), {}, { logger: createMockLogger(), runId: 'run-1', config: { local: { storeDir: dir } } })
    ).rejects.toThrow('crash');
    expect(fs.existsSync(path.join(dir, 'failing', 'run-1'))).toBe(false);
  });

  describe('when cleanup fails', () => {
    afterEach(() => {
      vi.restoreAllMocks();
    });

    it('surfaces the step error and logs the cleanup failure', async () => {
      const lost = new Error('disk gone');
      vi.spyOn(LocalStore.prototype, 'cleanup').mockRejectedValue(lost);
      const logger = createMockLogger();
      const failing = flow('failing', () =>
        getItems.next(
          step('crash', () => {
            throw new Error('crash');
          })
        )
      );

      await expect(
        runFlow(failing(), {}, { logger, runId: 'run-1', config: { local: { storeDir: dir } } })
      ).rejects.toThrow('crash');

      const warning = logger.calls.find(call => call.level === 'warn');
      expect(warning?.message).toBe('Failed to clean up intermediate values of run run-1');
      expect(warning?.args[1]).toBe(lost);
    });

    it('rejects with the cleanup error after a successful run', async () => {
      vi.spyOn(LocalStore.prototype, 'cleanup').mockRejectedValue(new Error('disk gone'));
      const numbers = flow('numbers', () => getItems.map(double).agg(sum));

      await expect(
        runFlow(numbers(), {}, { logger: createMockLogger(), config: { local: { storeDir: dir } } })
      ).rejects.toThrow('disk gone');
    });
  });
});
