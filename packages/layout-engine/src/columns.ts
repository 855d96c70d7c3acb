import { assertNever } from "./errors";
import { type LayoutConfig, hasMainColumn } from "./layout";
import { type Rect, remainderlessDivision, subrect } from "./rect";
import { type Size, sizeToAbsolute } from "./size";
import type { Split } from "./split";
import type { Flip, Rotation } from "./transform";

export type ColumnRole = "main" | "stack" | "secondStack";

export interface Column {
  role: ColumnRole;
  rect: Rect;
  /** 0 for a column whose space is reserved but holds no window. */
  windowCount: number;
  split: Split;
  /** Applied to the column's windows inside `rect`, after the split. */
  flip: Flip;
  rotation: Rotation;
}

export type WindowAllocation = Record<ColumnRole, number>;

/** Canonical window order: main first, then the first and second stack. */
export const COLUMN_ORDER: readonly ColumnRole[] = ["main", "stack", "secondStack"];

interface Slot {
  role: ColumnRole;
  windowCount: number;
  occupied: boolean;
  width: number;
}

/**
 * How many windows the main column may hold. A main column that is never
 * split takes one window at most; the excess goes to the stacks.
 */
export function mainCapacity(config: LayoutConfig): number {
  if (!hasMainColumn(config)) {
    return 0;
  }
  return config.mainSplit === "none" ? Math.min(config.mainWindowCount, 1) : config.mainWindowCount;
}

/**
 * Balanced stacks give the first stack the extra window when the remaining
 * count is odd. Unbalanced stacks put every remaining window in the first.
 * In a `centerMain` layout a first stack that is never split holds one
 * window and the rest go to the second stack, balanced or not.
 */
export function allocateWindows(windowCount: number, config: LayoutConfig): WindowAllocation {
  const main = Math.min(mainCapacity(config), windowCount);
  const remaining = windowCount - main;

  if (config.columnType === "centerMain" && config.stackSplit === "none") {
    const first = Math.min(remaining, 1);
    return { main, stack: first, secondStack: remaining - first };
  }
  if (config.columnType !== "centerMain" || !config.balanceStacks) {
    return { main, stack: remaining, secondStack: 0 };
  }

  const [first, second] = remainderlessDivision(remaining, 2);
  return { main, stack: first, secondStack: second };
}

/** Ratios cut the workspace through {@link subrect}; pixel sizes are clamped to its width. */
function mainColumnWidth(workspace: Rect, mainSize: Size): number {
  if (mainSize.unit === "ratio") {
    return subrect(workspace, 0, 0, mainSize.value, 1).width;
  }
  return sizeToAbsolute(mainSize, workspace.width);
}

function sizeMainAndStack(main: Slot, stack: Slot, workspace: Rect, mainSize: Size): Slot[] {
  const { width } = workspace;
  let mainWidth = 0;
  if (main.occupied) {
    mainWidth = stack.occupied ? mainColumnWidth(workspace, mainSize) : width;
  }
  return [
    { ...main, width: mainWidth },
    { ...stack, width: width - mainWidth }
  ];
}

function sizeCenterMain(left: Slot, main: Slot, right: Slot, workspace: Rect, mainSize: Size): Slot[] {
  const { width } = workspace;
  if (!main.occupied) {
    const leftWidth = left.occupied ? (right.occupied ? Math.floor(width / 2) : width) : 0;
    const rightWidth = right.occupied ? width - leftWidth : 0;
    return [
      { ...left, width: leftWidth },
      { ...main, width: 0 },
      { ...right, width: rightWidth }
    ];
  }

  // a side stack that takes no space hands its share to the main column
  const remaining = width - mainColumnWidth(workspace, mainSize);
  const leftWidth = left.occupied ? Math.floor(remaining / 2) : 0;
  const rightWidth = right.occupied ? remaining - Math.floor(remaining / 2) : 0;

  return [
    { ...left, width: leftWidth },
    { ...main, width: width - leftWidth - rightWidth },
    { ...right, width: rightWidth }
  ];
}

function columnContent(role: ColumnRole, config: LayoutConfig): Pick<Column, "split" | "flip" | "rotation"> {
  switch (role) {
    case "main":
      return { split: config.mainSplit, flip: config.mainFlip, rotation: config.mainRotation };
    case "stack":
      return { split: config.stackSplit, flip: config.stackFlip, rotation: config.stackRotation };
    case "secondStack":
      return { split: config.secondStackSplit, flip: config.secondStackFlip, rotation: config.secondStackRotation };
    default:
      return assertNever(role);
  }
}

function placeSlots(slots: Slot[], workspace: Rect, config: LayoutConfig): Column[] {
  const centered = config.reserveColumnSpace === "reserveAndCenter";
  const visible = slots.filter((slot) => (centered ? slot.windowCount > 0 : slot.occupied));

  let offset = workspace.x;
  if (centered) {
    const used = visible.reduce((total, slot) => total + slot.width, 0);
    offset += Math.floor((workspace.width - used) / 2);
  }

  const columns = visible.map((slot): Column => {
    const column: Column = {
      role: slot.role,
      rect: { x: offset, y: workspace.y, width: slot.width, height: workspace.height },
      windowCount: slot.windowCount,
      ...columnContent(slot.role, config)
    };
    offset += slot.width;
    return column;
  });

  return columns.sort((left, right) => COLUMN_ORDER.indexOf(left.role) - COLUMN_ORDER.indexOf(right.role));
}

/**
 * Partitions the workspace into columns and assigns each its windows.
 *
 * Columns are laid out left to right as `main | stack` or
 * `stack | main | secondStack`, but returned in canonical window order
 * ({@link COLUMN_ORDER}). A column occupies space when it holds windows or
 * when the reserve policy keeps it; columns that occupy nothing are left
 * out. With `reserveAndCenter`, only columns holding windows are returned,
 * centered in the workspace.
 */
export function composeColumns(workspace: Rect, windowCount: number, config: LayoutConfig): Column[] {
  if (windowCount === 0) {
    return [];
  }

  const allocation = allocateWindows(windowCount, config);
  const reserved = config.reserveColumnSpace !== "none";
  const slot = (role: ColumnRole): Slot => ({
    role,
    windowCount: allocation[role],
    occupied: allocation[role] > 0 || reserved,
    width: 0
  });

  switch (config.columnType) {
    case "stack":
      return placeSlots([{ ...slot("stack"), width: workspace.width }], workspace, config);
    case "mainAndStack":
      return placeSlots(
        sizeMainAndStack(slot("main"), slot("stack"), workspace, config.mainSize),
        workspace,
        config
      );
    case "centerMain":
      return placeSlots(
        sizeCenterMain(slot("stack"), slot("main"), slot("secondStack"), workspace, config.mainSize),
        workspace,
        config
      );
    default:
      return assertNever(config.columnType);
  }
}
