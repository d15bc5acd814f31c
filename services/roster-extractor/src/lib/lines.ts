/**
 * Line Reconstruction
 *
 * Positioned text fragments from one page back into visual lines.
 */

export interface PositionedText {
  x: number;
  y: number;
  str: string;
}

/**
 * Group text items into lines, top to bottom.
 *
 * Items whose baselines lie within `tolerance` points of a line's first item
 * join that line; items on a line are ordered left to right and joined by a space.
 */
export function buildLines(items: PositionedText[], tolerance: number): string[] {
  const sorted = items
    .filter(item => item.str.trim() !== '')
    .sort((a, b) => b.y - a.y || a.x - b.x);

  const rows: Array<{ y: number; items: PositionedText[] }> = [];
  for (const item of sorted) {
    const current = rows[rows.length - 1];
    if (current && Math.abs(current.y - item.y) <= tolerance) {
      current.items.push(item);
    } else {
      rows.push({ y: item.y, items: [item] });
    }
  }

  return rows
    .map(row =>
      row.items
        .sort((a, b) => a.x - b.x)
        .map(item => item.str)
        .join(' ')
        .trim()
    )
    .filter(line => line !== '');
}
