import { describe, expect, it } from "vitest";
import { type Column, type ColumnRole, allocateWindows, composeColumns, mainCapacity } from "./columns";
import { createLayoutConfig } from "./layout";
import { type Rect, subrect } from "./rect";
import { ratio } from "./size";
import type { Split } from "./split";

const WORKSPACE: Rect = { x: 0, y: 0, width: 5120, height: 1440 };

function column(role: ColumnRole, rect: Rect, windowCount: number, split: Split): Column {
  return { role, rect, windowCount, split, flip: "none", rotation: "north" };
}

describe("allocateWindows", () => {
  it("gives the main column at most its window count", () => {
    const config = createLayoutConfig({ mainWindowCount: 1 });
    expect(allocateWindows(5, config)).toEqual({ main: 1, stack: 4, secondStack: 0 });
    expect(allocateWindows(0, config)).toEqual({ main: 0, stack: 0, secondStack: 0 });
  });

  it("reroutes main windows beyond a single unsplit main", () => {
    const config = createLayoutConfig({ mainSplit: "none", mainWindowCount: 3 });
    expect(mainCapacity(config)).toBe(1);
    expect(allocateWindows(5, config)).toEqual({ main: 1, stack: 4, secondStack: 0 });
  });

  it("ignores the main window count for single stack layouts", () => {
    const config = createLayoutConfig({ columnType: "stack", mainWindowCount: 2 });
    expect(allocateWindows(3, config)).toEqual({ main: 0, stack: 3, secondStack: 0 });
  });

  it("balances center stacks with the extra window on the first stack", () => {
    const balanced = createLayoutConfig({ columnType: "centerMain", balanceStacks: true });
    const unbalanced = createLayoutConfig({ columnType: "centerMain", balanceStacks: false });
    expect(allocateWindows(8, balanced)).toEqual({ main: 1, stack: 4, secondStack: 3 });
    expect(allocateWindows(8, unbalanced)).toEqual({ main: 1, stack: 7, secondStack: 0 });
  });

  it("keeps a single window in an unsplit first stack beside a center main", () => {
    const config = createLayoutConfig({ columnType: "centerMain", stackSplit: "none" });
    expect(allocateWindows(1, config)).toEqual({ main: 1, stack: 0, secondStack: 0 });
    expect(allocateWindows(2, config)).toEqual({ main: 1, stack: 1, secondStack: 0 });
    expect(allocateWindows(8, config)).toEqual({ main: 1, stack: 1, secondStack: 6 });
    expect(allocateWindows(8, { ...config, balanceStacks: false })).toEqual({ main: 1, stack: 1, secondStack: 6 });
  });

  it("still decks an unsplit stack beside a left main", () => {
    const config = createLayoutConfig({ stackSplit: "none" });
    expect(allocateWindows(4, config)).toEqual({ main: 1, stack: 3, secondStack: 0 });
  });
});

describe("composeColumns", () => {
  const mainAndStack = createLayoutConfig({ mainSize: ratio(0.65) });
  const centerMain = createLayoutConfig({ columnType: "centerMain", mainSize: ratio(0.65) });

  it("returns no columns for zero windows", () => {
    expect(composeColumns(WORKSPACE, 0, mainAndStack)).toEqual([]);
  });

  it("splits main and stack by the main size", () => {
    expect(composeColumns(WORKSPACE, 3, mainAndStack)).toEqual([
      column("main", { x: 0, y: 0, width: 3328, height: 1440 }, 1, "vertical"),
      column("stack", { x: 3328, y: 0, width: 1792, height: 1440 }, 2, "horizontal")
    ]);
  });

  it("cuts the main column with the same floored edge as subrect", () => {
    const workspace: Rect = { x: 100, y: 20, width: 1000, height: 600 };
    const columns = composeColumns(workspace, 2, createLayoutConfig({ mainSize: ratio(0.333) }));
    expect(columns[0].rect).toEqual(subrect(workspace, 0, 0, 0.333, 1));
    expect(columns.map((entry) => entry.rect)).toEqual([
      { x: 100, y: 20, width: 333, height: 600 },
      { x: 433, y: 20, width: 667, height: 600 }
    ]);
  });

  it("carries each column's own split and modifiers", () => {
    const config = createLayoutConfig({
      columnType: "centerMain",
      secondStackSplit: "grid",
      mainFlip: "both",
      stackRotation: "east",
      secondStackFlip: "vertical",
      secondStackRotation: "south"
    });
    expect(
      composeColumns(WORKSPACE, 3, config).map(({ role, split, flip, rotation }) => [role, split, flip, rotation])
    ).toEqual([
      ["main", "vertical", "both", "north"],
      ["stack", "horizontal", "none", "east"],
      ["secondStack", "grid", "vertical", "south"]
    ]);
  });

  it("lets a lone main column fill the workspace", () => {
    expect(composeColumns(WORKSPACE, 1, mainAndStack)).toEqual([
      column("main", WORKSPACE, 1, "vertical")
    ]);
  });

  it("keeps an empty stack blank when space is reserved", () => {
    const columns = composeColumns(WORKSPACE, 1, { ...mainAndStack, reserveColumnSpace: "reserve" });
    expect(columns).toEqual([
      column("main", { x: 0, y: 0, width: 3328, height: 1440 }, 1, "vertical"),
      column("stack", { x: 3328, y: 0, width: 1792, height: 1440 }, 0, "horizontal")
    ]);
  });

  it("centers the occupied column with reserveAndCenter", () => {
    const columns = composeColumns(WORKSPACE, 1, { ...mainAndStack, reserveColumnSpace: "reserveAndCenter" });
    expect(columns).toEqual([
      column("main", { x: 896, y: 0, width: 3328, height: 1440 }, 1, "vertical")
    ]);
  });

  it("gives the stack everything when the main column is disabled", () => {
    const config = { ...mainAndStack, mainWindowCount: 0 };
    expect(composeColumns(WORKSPACE, 2, config)).toEqual([
      column("stack", WORKSPACE, 2, "horizontal")
    ]);
    expect(composeColumns(WORKSPACE, 2, { ...config, reserveColumnSpace: "reserve" })).toEqual([
      column("main", { x: 0, y: 0, width: 3328, height: 1440 }, 0, "vertical"),
      column("stack", { x: 3328, y: 0, width: 1792, height: 1440 }, 2, "horizontal")
    ]);
  });

  it("flanks a center main with two stacks", () => {
    expect(composeColumns(WORKSPACE, 3, centerMain)).toEqual([
      column("main", { x: 896, y: 0, width: 3328, height: 1440 }, 1, "vertical"),
      column("stack", { x: 0, y: 0, width: 896, height: 1440 }, 1, "horizontal"),
      column("secondStack", { x: 4224, y: 0, width: 896, height: 1440 }, 1, "horizontal")
    ]);
  });

  it("hands an empty second stack's space to the main column", () => {
    expect(composeColumns(WORKSPACE, 2, centerMain)).toEqual([
      column("main", { x: 896, y: 0, width: 4224, height: 1440 }, 1, "vertical"),
      column("stack", { x: 0, y: 0, width: 896, height: 1440 }, 1, "horizontal")
    ]);
  });

  it("keeps an empty second stack when space is reserved", () => {
    const columns = composeColumns(WORKSPACE, 2, { ...centerMain, reserveColumnSpace: "reserve" });
    expect(columns.map((column) => [column.role, column.rect.x, column.rect.width, column.windowCount])).toEqual([
      ["main", 896, 3328, 1],
      ["stack", 0, 896, 1],
      ["secondStack", 4224, 896, 0]
    ]);
  });

  it("splits the workspace between stacks without a main column", () => {
    const columns = composeColumns(WORKSPACE, 4, { ...centerMain, mainWindowCount: 0 });
    expect(columns).toEqual([
      column("stack", { x: 0, y: 0, width: 2560, height: 1440 }, 2, "horizontal"),
      column("secondStack", { x: 2560, y: 0, width: 2560, height: 1440 }, 2, "horizontal")
    ]);
  });

  it("puts every stack window in the first stack when unbalanced", () => {
    const columns = composeColumns(WORKSPACE, 8, { ...centerMain, balanceStacks: false });
    expect(columns.map((column) => [column.role, column.windowCount])).toEqual([
      ["main", 1],
      ["stack", 7]
    ]);
  });

  it("degenerates to zero-size columns on an empty workspace", () => {
    const columns = composeColumns({ x: 0, y: 0, width: 0, height: 0 }, 3, mainAndStack);
    expect(columns.map((column) => column.rect)).toEqual([
      { x: 0, y: 0, width: 0, height: 0 },
      { x: 0, y: 0, width: 0, height: 0 }
    ]);
  });
});
