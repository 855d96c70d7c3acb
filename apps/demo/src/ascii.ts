import { type Rect, rectsEqual } from "@tilecraft/layout-engine";

/**
 * Draws rects as box outlines on a character canvas of `width + 1` by
 * `height + 1` cells, so a rect's right and bottom edges land on
 * `x + width` and `y + height`. Each box is labelled with its 1-based index
 * in its top-left inner corner; windows stacked on the same rect share one
 * label, e.g. `1,2,3` for a monocle.
 *
 * ```txt
 * +---+---+
 * |1  |2  |
 * +---+---+
 * ```
 */
export function renderAscii(rects: readonly Rect[], width: number, height: number): string {
  const columns = width + 1;
  const rows = height + 1;
  const horizontal = Array.from({ length: rows }, () => new Array<boolean>(columns).fill(false));
  const vertical = Array.from({ length: rows }, () => new Array<boolean>(columns).fill(false));

  const mark = (grid: boolean[][], row: number, column: number) => {
    if (row >= 0 && row < rows && column >= 0 && column < columns) {
      grid[row][column] = true;
    }
  };

  for (const rect of rects) {
    const right = rect.x + rect.width;
    const bottom = rect.y + rect.height;
    for (let column = rect.x; column <= right; column += 1) {
      mark(horizontal, rect.y, column);
      mark(horizontal, bottom, column);
    }
    for (let row = rect.y; row <= bottom; row += 1) {
      mark(vertical, row, rect.x);
      mark(vertical, row, right);
    }
  }

  const canvas: string[][] = horizontal.map((line, row) =>
    line.map((isHorizontal, column) => {
      const isVertical = vertical[row][column];
      if (isHorizontal && isVertical) {
        return "+";
      }
      if (isHorizontal) {
        return "-";
      }
      return isVertical ? "|" : " ";
    })
  );

  // keyed by the first window on each distinct rect
  const labels = new Map<number, string>();
  rects.forEach((rect, index) => {
    const first = rects.findIndex((other) => rectsEqual(other, rect));
    const label = labels.get(first);
    labels.set(first, label === undefined ? String(index + 1) : `${label},${index + 1}`);
  });

  labels.forEach((label, index) => {
    const rect = rects[index];
    const row = rect.y + 1;
    if (rect.width < 2 || rect.height < 2 || row >= rows) {
      return;
    }
    for (let offset = 0; offset < label.length && offset < rect.width - 1; offset += 1) {
      const column = rect.x + 1 + offset;
      if (column >= 0 && column < columns && row >= 0) {
        canvas[row][column] = label[offset];
      }
    }
  });

  return canvas.map((line) => line.join("")).join("\n");
}
