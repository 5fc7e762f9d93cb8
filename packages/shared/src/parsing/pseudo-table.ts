/**
 * Pseudo-Table Builder
 *
 * Approximates tabular statement summaries without layout information:
 * every line shaped like "Label<two or more spaces or a tab>Value" becomes
 * one entry. Labels that span several lines or columns are not reconstructed.
 */

const TABLE_LINE_PATTERN = /^\s*([A-Za-z][A-Za-z0-9 &'/().#:-]*?)(?: {2,}|\t)\s*(\S.*?)\s*$/;

export type PseudoTable = ReadonlyMap<string, string>;

/**
 * Normalize a label for lookup: lower-case, collapse whitespace, drop a trailing colon.
 */
export function normalizeTableKey(label: string): string {
  return label
    .toLowerCase()
    .replace(/\s+/g, ' ')
    .trim()
    .replace(/\s*:$/, '');
}

/**
 * Build the label → raw value map. The first occurrence of a label wins.
 */
export function buildPseudoTable(text: string): PseudoTable {
  const table = new Map<string, string>();

  for (const line of text.split(/\r?\n/)) {
    const match = line.match(TABLE_LINE_PATTERN);
    if (!match) continue;

    const key = normalizeTableKey(match[1]);
    const value = match[2];
    if (key && value && !table.has(key)) {
      table.set(key, value);
    }
  }

  return table;
}
