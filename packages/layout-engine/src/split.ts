import { LayoutContractError, assertNever } from "./errors";
import { type Axis, type Rect, splitEvenly } from "./rect";

/**
 * How a column's rectangle is divided among its windows. The names refer to
 * the cuts, not to the resulting stack: `horizontal` cuts rows, `vertical`
 * cuts columns.
 */
export type Split = "none" | "horizontal" | "vertical" | "grid" | "fibonacci" | "dwindle";

export const SPLITS: readonly Split[] = ["none", "horizontal", "vertical", "grid", "fibonacci", "dwindle"];

export function splitNone(rect: Rect, count: number): Rect[] {
  if (count > 1) {
    throw new LayoutContractError(`Split "none" holds at most one window, got ${count}`);
  }
  return count === 1 ? [rect] : [];
}

export function splitHorizontal(rect: Rect, count: number): Rect[] {
  return splitEvenly(rect, count, "y");
}

export function splitVertical(rect: Rect, count: number): Rect[] {
  return splitEvenly(rect, count, "x");
}

/**
 * Near-square grid filled row by row. The last row may hold fewer cells,
 * which then share that row's full width.
 *
 * ```txt
 * +---+---+   +--+--+--+
 * |   |   |   |  |  |  |
 * +---+---+   +--+--+--+
 * |       |   |  |  |  |
 * +-------+   +--+--+--+
 *             |        |
 *             +--------+
 *  3 windows   7 windows
 * ```
 */
export function splitGrid(rect: Rect, count: number): Rect[] {
  if (count === 0) {
    return [];
  }

  const rows = Math.ceil(Math.sqrt(count));
  const columns = Math.ceil(count / rows);
  const lastRowCells = count - columns * (rows - 1);

  return splitEvenly(rect, rows, "y").flatMap((row, index) =>
    splitEvenly(row, index === rows - 1 ? lastRowCells : columns, "x")
  );
}

function halve(rect: Rect, axis: Axis): [Rect, Rect] {
  const [first, second] = splitEvenly(rect, 2, axis);
  return [first, second];
}

function nextAxis(axis: Axis): Axis {
  return axis === "x" ? "y" : "x";
}

/**
 * Each window takes the first half of the remaining space, alternating
 * between vertical and horizontal cuts, so the windows cascade towards the
 * bottom-right corner.
 *
 * ```txt
 * +-----+-----+
 * |     |     |
 * |     +--+--+
 * |     |  |  |
 * +-----+--+--+
 * ```
 */
export function splitFibonacci(rect: Rect, count: number): Rect[] {
  const tiles: Rect[] = [];
  let remaining = rect;
  let axis: Axis = "x";

  for (let index = 0; index < count; index += 1) {
    if (index === count - 1) {
      tiles.push(remaining);
      break;
    }
    const [current, rest] = halve(remaining, axis);
    tiles.push(current);
    remaining = rest;
    axis = nextAxis(axis);
  }

  return tiles;
}

/**
 * Same halving and axis alternation as {@link splitFibonacci}, but the half a
 * window takes turns around the remaining space (left, bottom, right, top)
 * so the windows spiral inwards.
 *
 * ```txt
 * +-----+--+--+
 * |     |4 |3 |
 * |     +--+--+
 * |     |  2  |
 * +-----+-----+
 * ```
 */
export function splitDwindle(rect: Rect, count: number): Rect[] {
  const tiles: Rect[] = [];
  let remaining = rect;
  let axis: Axis = "x";

  for (let index = 0; index < count; index += 1) {
    if (index === count - 1) {
      tiles.push(remaining);
      break;
    }
    const [first, second] = halve(remaining, axis);
    // steps 1 and 2 of every turn take the trailing half, steps 0 and 3 the leading one
    const step = index % 4;
    const backwards = step === 1 || step === 2;
    tiles.push(backwards ? second : first);
    remaining = backwards ? first : second;
    axis = nextAxis(axis);
  }

  return tiles;
}

export function splitRect(rect: Rect, count: number, split: Split): Rect[] {
  switch (split) {
    case "none":
      return splitNone(rect, count);
    case "horizontal":
      return splitHorizontal(rect, count);
    case "vertical":
      return splitVertical(rect, count);
    case "grid":
      return splitGrid(rect, count);
    case "fibonacci":
      return splitFibonacci(rect, count);
    case "dwindle":
      return splitDwindle(rect, count);
    default:
      return assertNever(split);
  }
}
