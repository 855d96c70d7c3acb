import { GeometryError } from "./errors";

export type Size = { unit: "ratio"; value: number } | { unit: "pixel"; value: number };

export function ratio(value: number): Size {
  return { unit: "ratio", value };
}

export function pixels(value: number): Size {
  return { unit: "pixel", value };
}

export function isValidSize(size: Size): boolean {
  if (!Number.isFinite(size.value) || size.value < 0) {
    return false;
  }
  return size.unit === "ratio" ? size.value <= 1 : Number.isInteger(size.value);
}

export function clampSize(size: Size, upperBound = Number.POSITIVE_INFINITY): Size {
  if (Number.isNaN(size.value)) {
    throw new GeometryError("Size value must be a number");
  }
  if (size.unit === "ratio") {
    return ratio(Math.max(0, Math.min(size.value, 1, upperBound)));
  }
  return pixels(Math.max(0, Math.min(Math.floor(size.value), Math.floor(upperBound))));
}

/**
 * Resolves a size against the extent it is measured in. Ratios are floored;
 * the result never exceeds `whole`.
 */
export function sizeToAbsolute(size: Size, whole: number): number {
  const absolute = size.unit === "ratio" ? Math.floor(whole * size.value) : size.value;
  return Math.max(0, Math.min(absolute, whole));
}
