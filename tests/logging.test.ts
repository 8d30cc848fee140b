import { describe, it, expect } from 'vitest';
import { createLogger, FanOutProgressLogger, StepLogger, type LogSink } from '../src/logging.js';
import { createMockLogger } from './helpers/test-utils.js';

interface Captured {
  sink: LogSink;
  out: string[];
  err: string[];
}

function capture(): Captured {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    sink: {
      out: line => {
        out.push(line);
      },
      err: line => {
        err.push(line);
      },
    },
  };
}

describe('createLogger', () => {
  it('writes human lines with the level and scope', () => {
    const { sink, out, err } = capture();
    const logger = createLogger('stepline.test', { showTimestamps: false }, sink);

    logger.info('hello', 'world');
    logger.warn('careful');
    logger.error('broken', new Error('boom'));

    expect(out).toEqual(['[INFO] [stepline.test] hello world']);
    expect(err).toEqual(['[WARN] [stepline.test] careful', '[ERROR] [stepline.test] broken boom']);
  });

  it('prefixes timestamps by default', () => {
    const { sink, out } = capture();
    createLogger('t', {}, sink).info('hi');

    expect(out[0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z\] \[INFO\] \[t\] hi$/);
  });

  it('drops messages below the configured level', () => {
    const { sink, out, err } = capture();
    const logger = createLogger('t', { level: 'warn', showTimestamps: false }, sink);

    logger.debug('d');
    logger.info('i');
    logger.warn('w');

    expect(out).toEqual([]);
    expect(err).toEqual(['[WARN] [t] w']);
  });

  it('keeps structured fields out of human lines', () => {
    const { sink, out } = capture();
    createLogger('t', { showTimestamps: false }, sink).info('Step started', { event: 'step_start', step: 'double' });

    expect(out).toEqual(['[INFO] [t] Step started']);
  });

  it('writes JSON lines with structured fields flattened', () => {
    const { sink, out } = capture();
    const logger = createLogger('stepline.runner', { format: 'json' }, sink);

    logger.info('Step started', { event: 'step_start', step: 'double' });
    logger.info('plain', 42);

    const first: unknown = JSON.parse(out[0]);
    expect(first).toMatchObject({
      level: 'info',
      scope: 'stepline.runner',
      event: 'step_start',
      step: 'double',
      message: 'Step started',
    });
    expect(JSON.parse(out[1])).toMatchObject({ event: 'log', message: 'plain 42' });
  });
});

describe('StepLogger', () => {
  it('logs start and completion with fields', () => {
    const logger = createMockLogger();
    const stepLogger = new StepLogger('double', logger);

    stepLogger.start();
    const duration = stepLogger.complete();

    expect(duration).toBeGreaterThanOrEqual(0);
    expect(logger.calls[0]).toEqual({
      level: 'info',
      message: "Step 'double' started",
      args: [{ event: 'step_start', step: 'double' }],
    });
    expect(logger.calls[1].message).toMatch(/^Step 'double' completed in \d+\.\d{3}s \(status=success\)$/);
    expect(logger.calls[1].args[0]).toMatchObject({ event: 'step_complete', step: 'double', status: 'success' });
  });

  it('logs failures at error level with the error', () => {
    const logger = createMockLogger();
    const failure = new Error('boom');
    const stepLogger = new StepLogger('double', logger);

    stepLogger.start();
    stepLogger.fail(failure);

    const call = logger.calls[1];
    expect(call.level).toBe('error');
    expect(call.message).toMatch(/^Step 'double' failed after \d+\.\d{3}s$/);
    expect(call.args[1]).toBe(failure);
  });

  it('reports zero duration when never started', () => {
    expect(new StepLogger('x', createMockLogger()).complete()).toBe(0);
  });
});

describe('FanOutProgressLogger', () => {
  it('reports each time the interval is crossed', () => {
    const logger = createMockLogger();
    const progress = new FanOutProgressLogger('double', 4, logger, 50);

    progress.start();
    progress.update('completed');
    progress.update('completed');
    progress.update('failed');
    progress.update('completed');
    progress.complete();

    const messages = logger.calls.map(call => call.message);
    expect(messages[0]).toBe("Fan-out 'double' started (4 items)");
    expect(messages.slice(1, 3)).toEqual([
      '  [==========>          ] 2/4 (50%)',
      '  [====================>] 3/4 (100%)',
    ]);
    expect(messages).toHaveLength(4);
    expect(messages[3]).toMatch(/^Fan-out 'double' completed in \d+\.\d{3}s$/);
    expect(progress.progress).toEqual({ completed: 3, failed: 1, total: 4 });
  });

  it('counts failures separately', () => {
    const progress = new FanOutProgressLogger('double', 2, createMockLogger());
    progress.update('failed');
    progress.update('completed');

    expect(progress.progress).toEqual({ completed: 1, failed: 1, total: 2 });
  });
});
