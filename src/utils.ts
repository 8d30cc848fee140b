import ms from 'ms';

/**
 * Parse duration strings like '500ms', '5s', '1m' to milliseconds.
 * @throws Error if the duration string is invalid
 */
export function parseDurationToMs(duration: string): number {
  const result = ms(duration as ms.StringValue);
  if (typeof result !== 'number' || Number.isNaN(result)) {
    throw new Error(`Invalid duration format: '${duration}'. Expected formats like '500ms', '5s', '1m', '2h'.`);
  }
  return result;
}

/**
 * Normalize a delay to seconds. Plain numbers are already seconds.
 */
export function toSeconds(value: number | string): number {
  return typeof value === 'number' ? value : parseDurationToMs(value) / 1000;
}

export function toPascalCase(str: string): string {
  return str
    .split(/[-_]/)
    .filter(word => word.length > 0)
    .map(word => word.charAt(0).toUpperCase() + word.slice(1))
    .join('');
}

/**
 * `my_flow`, `myFlow` and `My Flow` all become `my-flow`. Anything outside
 * `[a-z0-9-]` turns into a separator, so `a/b` becomes `a-b`.
 */
export function toKebabCase(str: string): string {
  return str
    .replace(/([a-z0-9])([A-Z])/g, '$1-$2')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
