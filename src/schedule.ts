import { FlowDefinitionError } from './errors.js';

const RATE_UNITS = new Set(['minute', 'minutes', 'hour', 'hours', 'day', 'days']);

/**
 * Check a schedule expression: `cron(<5 or 6 fields>)` or `rate(<n> <unit>)`.
 * Returns the trimmed expression.
 * @throws FlowDefinitionError with code INVALID_SCHEDULE
 */
export function validateSchedule(expression: string): string {
  const trimmed = expression.trim();

  const cron = /^cron\((.*)\)$/.exec(trimmed);
  if (cron) {
    const fields = cron[1].trim().split(/\s+/).filter(field => field.length > 0);
    if (fields.length < 5 || fields.length > 6) {
      throw invalid(expression, `cron expressions take 5 or 6 fields, got ${fields.length}`);
    }
    return trimmed;
  }

  const rate = /^rate\((.*)\)$/.exec(trimmed);
  if (rate) {
    const parts = rate[1].trim().split(/\s+/);
    if (parts.length !== 2) {
      throw invalid(expression, "rate expressions look like 'rate(5 minutes)'");
    }
    const [amount, unit] = parts;
    if (!/^\d+$/.test(amount) || Number(amount) < 1) {
      throw invalid(expression, `'${amount}' is not a positive integer`);
    }
    if (!RATE_UNITS.has(unit)) {
      throw invalid(expression, `unit must be one of ${[...RATE_UNITS].join(', ')}`);
    }
    return trimmed;
  }

  throw invalid(expression, 'expected cron(...) or rate(...)');
}

function invalid(expression: string, reason: string): FlowDefinitionError {
  return new FlowDefinitionError('INVALID_SCHEDULE', `Invalid schedule '${expression}': ${reason}`);
}
