import { GeometryError } from "./errors";

export interface Rect {
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
}

/** The extent a rectangle is divided along: `"x"` cuts columns, `"y"` cuts rows. */
export type Axis = "x" | "y";

function assertInteger(value: number, label: string): void {
  if (!Number.isInteger(value)) {
    throw new GeometryError(`${label} must be an integer, got ${value}`);
  }
}

export function assertValidRect(rect: Rect): void {
  assertInteger(rect.x, "x");
  assertInteger(rect.y, "y");
  assertInteger(rect.width, "width");
  assertInteger(rect.height, "height");
  if (rect.width < 0 || rect.height < 0) {
    throw new GeometryError(`Rect dimensions must not be negative, got ${rect.width}x${rect.height}`);
  }
}

export function createRect(x: number, y: number, width: number, height: number): Rect {
  const rect = { x, y, width, height };
  assertValidRect(rect);
  return rect;
}

/**
 * Integer division returning the quotient and the remainder.
 */
export function divrem(dividend: number, divisor: number): [number, number] {
  return [Math.floor(dividend / divisor), dividend % divisor];
}

/**
 * Splits `total` into `parts` integers that sum to `total`, differing by at
 * most one. The earliest parts receive the remainder, e.g. 11 / 3 → [4, 4, 3].
 */
export function remainderlessDivision(total: number, parts: number): number[] {
  if (parts === 0) {
    return [];
  }
  const [quotient, remainder] = divrem(total, parts);
  return Array.from({ length: parts }, (_, index) => (index < remainder ? quotient + 1 : quotient));
}

export function splitEvenly(rect: Rect, count: number, axis: Axis): Rect[] {
  if (!Number.isInteger(count) || count < 0) {
    throw new GeometryError(`Cannot split a rect into ${count} parts`);
  }

  const extent = axis === "x" ? rect.width : rect.height;
  let offset = axis === "x" ? rect.x : rect.y;

  return remainderlessDivision(extent, count).map((size) => {
    const part: Rect =
      axis === "x"
        ? { x: offset, y: rect.y, width: size, height: rect.height }
        : { x: rect.x, y: offset, width: rect.width, height: size };
    offset += size;
    return part;
  });
}

function assertRatio(value: number, label: string): void {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new GeometryError(`${label} must be a ratio between 0 and 1, got ${value}`);
  }
}

/**
 * Proportional sub-rectangle. Both edges are floored against the parent, so
 * neighbouring sub-rectangles built from the same ratios never overlap.
 */
export function subrect(rect: Rect, xRatio: number, yRatio: number, widthRatio: number, heightRatio: number): Rect {
  assertRatio(xRatio, "xRatio");
  assertRatio(yRatio, "yRatio");
  assertRatio(widthRatio, "widthRatio");
  assertRatio(heightRatio, "heightRatio");

  const left = Math.floor(rect.width * xRatio);
  const top = Math.floor(rect.height * yRatio);
  const right = Math.min(rect.width, Math.floor(rect.width * (xRatio + widthRatio)));
  const bottom = Math.min(rect.height, Math.floor(rect.height * (yRatio + heightRatio)));

  return {
    x: rect.x + left,
    y: rect.y + top,
    width: Math.max(0, right - left),
    height: Math.max(0, bottom - top)
  };
}

export function surfaceArea(rect: Rect): number {
  return rect.width * rect.height;
}

export function rectsEqual(left: Rect, right: Rect): boolean {
  return left.x === right.x && left.y === right.y && left.width === right.width && left.height === right.height;
}
