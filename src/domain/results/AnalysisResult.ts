/**
 * Base class for every result the engine returns
 */

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Abstract base providing JSON and CSV serialization
 */
export abstract class AnalysisResult {
  /**
   * Convert the result to a JSON-serializable object
   */
  abstract toJSON(): Record<string, unknown>;

  /**
   * Export as a two-line CSV (header row, value row)
   */
  toCSV(): string {
    return this.flattenToCSV(this.toJSON());
  }

  /**
   * Flatten a nested object to CSV. Nested objects become dotted columns,
   * arrays are joined with ';'.
   */
  protected flattenToCSV(data: Record<string, unknown>): string {
    const flatten = (obj: Record<string, unknown>, prefix = ''): Record<string, string> => {
      const result: Record<string, string> = {};

      for (const [key, value] of Object.entries(obj)) {
        if (value === null || value === undefined) {
          result[prefix + key] = '';
        } else if (Array.isArray(value)) {
          result[prefix + key] = value
            .map((item) => (typeof item === 'object' && item !== null ? JSON.stringify(item) : String(item)))
            .join(';');
        } else if (isRecord(value)) {
          Object.assign(result, flatten(value, prefix + key + '.'));
        } else {
          result[prefix + key] = String(value);
        }
      }

      return result;
    };

    const flattened = flatten(data);
    const escape = (v: string) => (/[",\n]/.test(v) ? `"${v.replace(/"/g, '""')}"` : v);
    const headers = Object.keys(flattened).map(escape);
    const values = Object.values(flattened).map(escape);

    return [headers.join(','), values.join(',')].join('\n');
  }
}
