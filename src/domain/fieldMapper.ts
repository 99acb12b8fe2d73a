import { CANONICAL_FIELDS, type FieldName } from "./schema.js";
import { collapseWhitespace } from "./normalize.js";

export type FieldResolution = {
  /** Source column per canonical field, null when the header has no match. */
  indexes: (number | null)[];
  matchedColumns: string[];
  unmatchedColumns: string[];
  missingFields: FieldName[];
};

type FieldPattern = { name: FieldName; pattern: RegExp };

/**
 * Locate each canonical field in an arbitrary header row.
 *
 * Each field takes the first column its pattern matches at the start of the
 * name. Fields are resolved independently, so one column can serve several.
 */
export function resolveFieldIndexes(
  header: readonly string[],
  fields: readonly FieldPattern[] = CANONICAL_FIELDS
): FieldResolution {
  const columns = header.map(collapseWhitespace);
  const claimed = new Set<number>();
  const matchedColumns: string[] = [];
  const missingFields: FieldName[] = [];

  const indexes = fields.map(({ name, pattern }) => {
    const idx = columns.findIndex(col => pattern.exec(col)?.index === 0);
    if (idx === -1) {
      missingFields.push(name);
      return null;
    }
    if (!claimed.has(idx)) {
      claimed.add(idx);
      matchedColumns.push(columns[idx]);
    }
    return idx;
  });

  const unmatchedColumns = columns.filter((_, i) => !claimed.has(i));
  return { indexes, matchedColumns, unmatchedColumns, missingFields };
}
