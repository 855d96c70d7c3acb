import { LayoutConfigError } from "./errors";
import { type Size, clampSize, isValidSize, pixels, ratio } from "./size";
import { SPLITS, type Split } from "./split";
import {
  FLIPS,
  type Flip,
  ROTATIONS,
  type Rotation,
  rotateClockwise,
  rotateCounterClockwise,
  toggleHorizontal,
  toggleVertical
} from "./transform";

/**
 * - `stack`: one column, no main.
 * - `mainAndStack`: main column on the left, one stack on the right.
 * - `centerMain`: main column in the middle, a stack on either side.
 */
export type ColumnType = "stack" | "mainAndStack" | "centerMain";

/**
 * What happens to the space of a column without windows: `none` gives it to
 * its neighbours, `reserve` leaves it blank, `reserveAndCenter` leaves it
 * blank and centers the occupied columns.
 */
export type ReserveColumnSpace = "none" | "reserve" | "reserveAndCenter";

export const COLUMN_TYPES: readonly ColumnType[] = ["stack", "mainAndStack", "centerMain"];
export const RESERVE_COLUMN_SPACES: readonly ReserveColumnSpace[] = ["none", "reserve", "reserveAndCenter"];

export interface LayoutConfig {
  readonly columnType: ColumnType;
  /** `none` caps the main column at a single window. */
  readonly mainSplit: Split;
  /** In a `centerMain` layout, `none` caps the first stack at a single window. */
  readonly stackSplit: Split;
  readonly secondStackSplit: Split;
  /** Windows placed in the main column; 0 disables it. */
  readonly mainWindowCount: number;
  /** Width of the main column, as a ratio of the workspace or in pixels. */
  readonly mainSize: Size;
  readonly flipped: Flip;
  readonly rotation: Rotation;
  /**
   * Modifiers applied to a single column's windows after its split, inside
   * that column. `flipped` and `rotation` move the columns themselves.
   */
  readonly mainFlip: Flip;
  readonly mainRotation: Rotation;
  readonly stackFlip: Flip;
  readonly stackRotation: Rotation;
  readonly secondStackFlip: Flip;
  readonly secondStackRotation: Rotation;
  readonly reserveColumnSpace: ReserveColumnSpace;
  /** Spread stack windows across both stacks of a `centerMain` layout. */
  readonly balanceStacks: boolean;
}

export const MAIN_SIZE_PIXEL_STEP = 50;
export const MAIN_SIZE_RATIO_STEP = 0.05;

export function createLayoutConfig(overrides: Partial<LayoutConfig> = {}): LayoutConfig {
  return {
    columnType: "mainAndStack",
    mainSplit: "vertical",
    stackSplit: "horizontal",
    secondStackSplit: "horizontal",
    mainWindowCount: 1,
    mainSize: ratio(0.5),
    flipped: "none",
    rotation: "north",
    mainFlip: "none",
    mainRotation: "north",
    stackFlip: "none",
    stackRotation: "north",
    secondStackFlip: "none",
    secondStackRotation: "north",
    reserveColumnSpace: "none",
    balanceStacks: true,
    ...overrides
  };
}

function assertOneOf<T>(value: T, allowed: readonly T[], label: string): void {
  if (!allowed.includes(value)) {
    throw new LayoutConfigError(`Unknown ${label}: ${String(value)}`);
  }
}

export function validateLayoutConfig(config: LayoutConfig): void {
  assertOneOf(config.columnType, COLUMN_TYPES, "column type");
  assertOneOf(config.mainSplit, SPLITS, "main split");
  assertOneOf(config.stackSplit, SPLITS, "stack split");
  assertOneOf(config.secondStackSplit, SPLITS, "second stack split");
  assertOneOf(config.flipped, FLIPS, "flip");
  assertOneOf(config.rotation, ROTATIONS, "rotation");
  assertOneOf(config.mainFlip, FLIPS, "main flip");
  assertOneOf(config.mainRotation, ROTATIONS, "main rotation");
  assertOneOf(config.stackFlip, FLIPS, "stack flip");
  assertOneOf(config.stackRotation, ROTATIONS, "stack rotation");
  assertOneOf(config.secondStackFlip, FLIPS, "second stack flip");
  assertOneOf(config.secondStackRotation, ROTATIONS, "second stack rotation");
  assertOneOf(config.reserveColumnSpace, RESERVE_COLUMN_SPACES, "reserve policy");

  if (!Number.isInteger(config.mainWindowCount) || config.mainWindowCount < 0) {
    throw new LayoutConfigError(`Main window count must be a non-negative integer, got ${config.mainWindowCount}`);
  }
  if (!isValidSize(config.mainSize)) {
    throw new LayoutConfigError(`Invalid main size: ${config.mainSize.value} (${config.mainSize.unit})`);
  }
}

export function hasMainColumn(config: LayoutConfig): boolean {
  return config.columnType !== "stack";
}

export function getMainWindowCount(config: LayoutConfig): number | undefined {
  return hasMainColumn(config) ? config.mainWindowCount : undefined;
}

export function getMainSize(config: LayoutConfig): Size | undefined {
  return hasMainColumn(config) ? config.mainSize : undefined;
}

export function setMainSize(config: LayoutConfig, size: Size): LayoutConfig {
  return { ...config, mainSize: clampSize(size) };
}

/**
 * Adds `delta` (in the size's own unit) to the main size, keeping it within
 * `[0, upperBound]`. Ratios never exceed 1.
 */
export function changeMainSize(config: LayoutConfig, delta: number, upperBound: number): LayoutConfig {
  const { mainSize } = config;
  const next: Size =
    mainSize.unit === "ratio" ? ratio(mainSize.value + delta) : pixels(mainSize.value + delta);
  return { ...config, mainSize: clampSize(next, upperBound) };
}

export function increaseMainSize(config: LayoutConfig, upperBound: number): LayoutConfig {
  const step = config.mainSize.unit === "ratio" ? MAIN_SIZE_RATIO_STEP : MAIN_SIZE_PIXEL_STEP;
  return changeMainSize(config, step, upperBound);
}

export function decreaseMainSize(config: LayoutConfig): LayoutConfig {
  const step = config.mainSize.unit === "ratio" ? MAIN_SIZE_RATIO_STEP : MAIN_SIZE_PIXEL_STEP;
  return changeMainSize(config, -step, Number.POSITIVE_INFINITY);
}

export function increaseMainWindowCount(config: LayoutConfig): LayoutConfig {
  return { ...config, mainWindowCount: config.mainWindowCount + 1 };
}

export function decreaseMainWindowCount(config: LayoutConfig): LayoutConfig {
  return { ...config, mainWindowCount: Math.max(0, config.mainWindowCount - 1) };
}

export function toggleFlipHorizontal(config: LayoutConfig): LayoutConfig {
  return { ...config, flipped: toggleHorizontal(config.flipped) };
}

export function toggleFlipVertical(config: LayoutConfig): LayoutConfig {
  return { ...config, flipped: toggleVertical(config.flipped) };
}

export function rotateLayout(config: LayoutConfig, clockwise: boolean): LayoutConfig {
  return {
    ...config,
    rotation: clockwise ? rotateClockwise(config.rotation) : rotateCounterClockwise(config.rotation)
  };
}

export function toggleBalanceStacks(config: LayoutConfig): LayoutConfig {
  return { ...config, balanceStacks: !config.balanceStacks };
}

export function isMonocle(config: LayoutConfig): boolean {
  return config.columnType === "stack" && config.stackSplit === "none";
}

export function isMainAndDeck(config: LayoutConfig): boolean {
  return config.columnType === "mainAndStack" && config.mainSplit === "none" && config.stackSplit === "none";
}
