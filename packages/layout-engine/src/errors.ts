export class GeometryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "GeometryError";
  }
}

export class LayoutConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "LayoutConfigError";
  }
}

/**
 * Raised when a split strategy is asked for more rectangles than it can
 * produce. The column composer never does this; seeing it is a bug.
 */
export class LayoutContractError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "LayoutContractError";
  }
}

export function assertNever(value: never): never {
  throw new LayoutContractError(`Unexpected variant: ${String(value)}`);
}
