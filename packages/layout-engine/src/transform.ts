import { assertNever } from "./errors";
import type { Rect } from "./rect";

/**
 * Mirror applied to a whole layout. `horizontal` mirrors left and right
 * (reversing column order), `vertical` mirrors top and bottom (reversing
 * row order).
 */
export type Flip = "none" | "horizontal" | "vertical" | "both";

/** Clockwise rotation of a whole layout: 0°, 90°, 180° and 270°. */
export type Rotation = "north" | "east" | "south" | "west";

export const FLIPS: readonly Flip[] = ["none", "horizontal", "vertical", "both"];
export const ROTATIONS: readonly Rotation[] = ["north", "east", "south", "west"];

export function isFlippedHorizontal(flip: Flip): boolean {
  return flip === "horizontal" || flip === "both";
}

export function isFlippedVertical(flip: Flip): boolean {
  return flip === "vertical" || flip === "both";
}

export function toggleHorizontal(flip: Flip): Flip {
  switch (flip) {
    case "none":
      return "horizontal";
    case "horizontal":
      return "none";
    case "vertical":
      return "both";
    case "both":
      return "vertical";
    default:
      return assertNever(flip);
  }
}

export function toggleVertical(flip: Flip): Flip {
  switch (flip) {
    case "none":
      return "vertical";
    case "horizontal":
      return "both";
    case "vertical":
      return "none";
    case "both":
      return "horizontal";
    default:
      return assertNever(flip);
  }
}

export function rotateClockwise(rotation: Rotation): Rotation {
  return ROTATIONS[(ROTATIONS.indexOf(rotation) + 1) % ROTATIONS.length];
}

export function rotateCounterClockwise(rotation: Rotation): Rotation {
  return ROTATIONS[(ROTATIONS.indexOf(rotation) + ROTATIONS.length - 1) % ROTATIONS.length];
}

/** Whether the rotation swaps the container's width and height. */
export function swapsAxes(rotation: Rotation): boolean {
  return rotation === "east" || rotation === "west";
}

export function flipRects(rects: Rect[], flip: Flip, container: Rect): Rect[] {
  if (flip === "none") {
    return rects;
  }

  const right = container.x + container.width;
  const bottom = container.y + container.height;

  return rects.map((rect) => ({
    x: isFlippedHorizontal(flip) ? right - (rect.x - container.x) - rect.width : rect.x,
    y: isFlippedVertical(flip) ? bottom - (rect.y - container.y) - rect.height : rect.y,
    width: rect.width,
    height: rect.height
  }));
}

/**
 * Rotates rects that were laid out inside `frame` and places the result at
 * `origin`. For `east` and `west` the frame must already have the target's
 * width and height swapped; every pixel maps to exactly one pixel, so a
 * gap-free tiling stays gap-free.
 */
export function rotateRects(rects: Rect[], rotation: Rotation, frame: Rect, origin: { x: number; y: number }): Rect[] {
  return rects.map((rect) => {
    const x = rect.x - frame.x;
    const y = rect.y - frame.y;

    switch (rotation) {
      case "north":
        return { x: origin.x + x, y: origin.y + y, width: rect.width, height: rect.height };
      case "east":
        return {
          x: origin.x + frame.height - y - rect.height,
          y: origin.y + x,
          width: rect.height,
          height: rect.width
        };
      case "south":
        return {
          x: origin.x + frame.width - x - rect.width,
          y: origin.y + frame.height - y - rect.height,
          width: rect.width,
          height: rect.height
        };
      case "west":
        return {
          x: origin.x + y,
          y: origin.y + frame.width - x - rect.width,
          width: rect.height,
          height: rect.width
        };
      default:
        return assertNever(rotation);
    }
  });
}
