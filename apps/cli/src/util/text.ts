/**
 * Flat text rendering: an object prints as `key: value` lines, a list as
 * blocks each preceded by `---`.
 */

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function formatScalar(value: unknown): string {
  if (value === null || value === undefined) return 'null';
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

function formatRecord(record: Record<string, unknown>): string[] {
  return Object.entries(record).map(([key, value]) => `${key}: ${formatScalar(value)}`);
}

export function formatFlatText(value: unknown): string {
  if (Array.isArray(value)) {
    const lines: string[] = [];
    for (const item of value) {
      lines.push('---');
      lines.push(...(isRecord(item) ? formatRecord(item) : [formatScalar(item)]));
    }
    return lines.join('\n');
  }
  if (isRecord(value)) {
    return formatRecord(value).join('\n');
  }
  return formatScalar(value);
}
