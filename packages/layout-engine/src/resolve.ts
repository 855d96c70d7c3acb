import { type Column, composeColumns } from "./columns";
import { LayoutConfigError } from "./errors";
import { type LayoutConfig, validateLayoutConfig } from "./layout";
import { type Rect, assertValidRect } from "./rect";
import { splitRect } from "./split";
import { type Rotation, flipRects, rotateRects, swapsAxes } from "./transform";

/** A frame at the origin with the extent `rotation` turns into `rect`. */
function rotationFrame(rect: Rect, rotation: Rotation): Rect {
  return swapsAxes(rotation)
    ? { x: 0, y: 0, width: rect.height, height: rect.width }
    : { x: 0, y: 0, width: rect.width, height: rect.height };
}

/**
 * Splits one column among its windows, then applies the column's own flip
 * and rotation inside its rect. A column that is never split but holds
 * several windows is a deck: every window gets the whole column.
 */
export function splitColumn(column: Column): Rect[] {
  const frame = rotationFrame(column.rect, column.rotation);
  const tiles =
    column.split === "none" && column.windowCount > 1
      ? Array.from({ length: column.windowCount }, () => ({ ...frame }))
      : splitRect(frame, column.windowCount, column.split);
  return rotateRects(flipRects(tiles, column.flip, frame), column.rotation, frame, column.rect);
}

/**
 * Computes one rectangle per window.
 *
 * The result is in canonical window order: the main column's windows first,
 * then the first stack's, then the second stack's. Flip and rotation move
 * rectangles around but never reorder them, so index `i` always belongs to
 * the caller's `i`-th window.
 */
export function resolveLayout(workspace: Rect, windowCount: number, config: LayoutConfig): Rect[] {
  assertValidRect(workspace);
  if (!Number.isInteger(windowCount) || windowCount < 0) {
    throw new LayoutConfigError(`Window count must be a non-negative integer, got ${windowCount}`);
  }
  validateLayoutConfig(config);

  if (windowCount === 0) {
    return [];
  }

  // lay out in the frame the rotation will turn into the workspace
  const frame = rotationFrame(workspace, config.rotation);

  const tiles = composeColumns(frame, windowCount, config).flatMap(splitColumn);
  return rotateRects(flipRects(tiles, config.flipped, frame), config.rotation, frame, workspace);
}
