import type { ArchiveEmbedField } from '../../types/archive.js';

export const DEFAULT_EMBED_COLOR = '#202225';

const MAX_INLINE_FIELDS_PER_ROW = 3;

/**
 * Convert Discord's integer embed colour to `#rrggbb`
 */
export function embedColor(color?: number): string {
  if (color === undefined || !Number.isInteger(color) || color < 0) {
    return DEFAULT_EMBED_COLOR;
  }
  return `#${(color & 0xffffff).toString(16).padStart(6, '0')}`;
}

/**
 * Lay embed fields out in rows: consecutive inline fields share a row
 * (up to three), block fields take a row of their own
 */
export function layoutEmbedFields(
  fields: ArchiveEmbedField[]
): ArchiveEmbedField[][] {
  const rows: ArchiveEmbedField[][] = [];
  let inlineRow: ArchiveEmbedField[] = [];

  for (const field of fields) {
    if (!field.inline) {
      if (inlineRow.length > 0) {
        rows.push(inlineRow);
        inlineRow = [];
      }
      rows.push([field]);
      continue;
    }

    inlineRow.push(field);
    if (inlineRow.length === MAX_INLINE_FIELDS_PER_ROW) {
      rows.push(inlineRow);
      inlineRow = [];
    }
  }

  if (inlineRow.length > 0) {
    rows.push(inlineRow);
  }
  return rows;
}
