/**
 * Shared tokenizer for line-oriented `|` definition files
 * @module loaders/records
 */

export interface DefinitionRecord {
  lineNumber: number;
  kind: string;
  fields: string[];
}

/**
 * Split text into records, skipping blank lines and `#` comments.
 * `fields` holds every `|`-separated part after the kind, trimmed.
 */
export function readRecords(text: string): DefinitionRecord[] {
  const records: DefinitionRecord[] = [];
  text.split(/\r?\n/).forEach((raw, i) => {
    const line = raw.trim();
    if (!line || line.startsWith('#')) return;
    const parts = line.split('|').map(p => p.trim());
    records.push({ lineNumber: i + 1, kind: parts[0], fields: parts.slice(1) });
  });
  return records;
}

/**
 * Parse a decimal field
 * @throws {Error} If the field is empty or not a finite number
 */
export function parseNumber(field: string, name: string): number {
  const value = field === '' ? NaN : Number(field);
  if (!Number.isFinite(value)) {
    throw new Error(`${name} '${field}' is not a number`);
  }
  return value;
}

/**
 * Comma-separated id list, empty items dropped
 */
export function parseIdList(field: string): string[] {
  return field.split(',').map(s => s.trim()).filter(Boolean);
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
