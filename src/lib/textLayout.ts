// Items closer than this vertically belong to the same printed line
const LINE_TOLERANCE = 5;

export interface PositionedText {
  str: string;
  x: number;
  y: number;
}

/**
 * Group positioned text items of one page into printed lines.
 */
export function toLines(items: PositionedText[]): string[] {
  // Sort by position (top to bottom, left to right)
  const sorted = [...items].sort((a, b) => {
    const yDiff = b.y - a.y; // Higher Y = top of page
    if (Math.abs(yDiff) > LINE_TOLERANCE) return yDiff;
    return a.x - b.x;
  });

  const lines: string[] = [];
  let current: string[] = [];
  let currentY: number | null = null;

  for (const item of sorted) {
    if (currentY !== null && Math.abs(currentY - item.y) > LINE_TOLERANCE) {
      lines.push(current.join(' ').replace(/\s+/g, ' ').trim());
      current = [];
    }
    if (currentY === null || current.length === 0) currentY = item.y;
    current.push(item.str);
  }
  if (current.length > 0) {
    lines.push(current.join(' ').replace(/\s+/g, ' ').trim());
  }

  return lines;
}
