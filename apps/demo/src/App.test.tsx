import { fireEvent, render, screen } from "@testing-library/react";
import App from "./App";
import { PREFS_STORAGE_KEY } from "./prefs";

function tile(index: number): HTMLElement {
  return screen.getByRole("listitem", { name: `Window ${index}` });
}

describe("App", () => {
  beforeEach(() => {
    window.localStorage.clear();
  });

  it("renders the default layout", () => {
    render(<App />);
    expect(screen.getByRole("main", { name: "Tiling layout demo" })).toBeInTheDocument();
    expect(screen.getByRole("combobox", { name: "Layout" })).toHaveValue("MainAndVertStack");
    expect(screen.getByRole("status")).toHaveTextContent("MainAndVertStack: 3 windows, 1 main at 50%");
    expect(screen.getAllByRole("listitem")).toHaveLength(3);
  });

  it("places tiles relative to the workspace", () => {
    render(<App />);
    expect(tile(1).style.left).toBe("0%");
    expect(tile(1).style.width).toBe("50%");
    expect(tile(1).style.height).toBe("100%");
    expect(tile(2).style.left).toBe("50%");
    expect(tile(2).style.height).toBe("50%");
    expect(tile(3).style.top).toBe("50%");
  });

  it("adds and removes windows and remembers the count", () => {
    render(<App />);
    fireEvent.click(screen.getByRole("button", { name: "Add window" }));
    expect(screen.getAllByRole("listitem")).toHaveLength(4);
    expect(JSON.parse(window.localStorage.getItem(PREFS_STORAGE_KEY) ?? "null")).toMatchObject({
      layoutName: "MainAndVertStack",
      windowCount: 4
    });

    for (let count = 0; count < 4; count += 1) {
      fireEvent.click(screen.getByRole("button", { name: "Remove window" }));
    }
    expect(screen.queryAllByRole("listitem")).toHaveLength(0);
    expect(screen.getByRole("button", { name: "Remove window" })).toBeDisabled();
    expect(screen.getByRole("status")).toHaveTextContent("MainAndVertStack: 0 windows, 1 main at 50%");
  });

  it("switches presets from the picker and the cycle buttons", () => {
    render(<App />);
    fireEvent.change(screen.getByRole("combobox", { name: "Layout" }), { target: { value: "Monocle" } });
    expect(screen.getByRole("status")).toHaveTextContent("Monocle: 3 windows, no main column");
    expect(screen.getAllByRole("listitem").map((item) => item.style.width)).toEqual(["100%", "100%", "100%"]);
    expect(screen.getByRole("button", { name: "Grow main" })).toBeDisabled();
    const ascii = (screen.getByLabelText("ASCII preview").textContent ?? "").split("\n");
    expect(ascii[1]).toBe(`|1,2,3${" ".repeat(42)}|`);

    fireEvent.click(screen.getByRole("button", { name: "Next layout" }));
    expect(screen.getByRole("combobox", { name: "Layout" })).toHaveValue("Grid");
    fireEvent.click(screen.getByRole("button", { name: "Previous layout" }));
    fireEvent.click(screen.getByRole("button", { name: "Previous layout" }));
    expect(screen.getByRole("combobox", { name: "Layout" })).toHaveValue("EvenVertical");
  });

  it("adjusts the main column", () => {
    render(<App />);
    fireEvent.click(screen.getByRole("button", { name: "Grow main" }));
    expect(screen.getByRole("status")).toHaveTextContent("MainAndVertStack: 3 windows, 1 main at 55%");

    fireEvent.click(screen.getByRole("button", { name: "Reset layout" }));
    fireEvent.click(screen.getByRole("button", { name: "More main windows" }));
    expect(screen.getByRole("status")).toHaveTextContent("MainAndVertStack: 3 windows, 2 main at 50%");
    expect(tile(1).style.width).toBe("25%");
    expect(tile(2).style.left).toBe("25%");
    expect(tile(3).style.height).toBe("100%");
  });

  it("flips and rotates the preview", () => {
    render(<App />);
    fireEvent.click(screen.getByRole("button", { name: "Flip horizontally" }));
    expect(tile(1).style.left).toBe("50%");
    expect(tile(2).style.left).toBe("0%");

    fireEvent.click(screen.getByRole("button", { name: "Reset layout" }));
    fireEvent.click(screen.getByRole("button", { name: "Rotate" }));
    expect(tile(1).style.width).toBe("100%");
    expect(tile(1).style.height).toBe("50%");
    expect(tile(2).style.left).toBe("50%");
    expect(tile(2).style.top).toBe("50%");
    expect(tile(3).style.left).toBe("0%");
  });

  it("toggles stack balancing", () => {
    render(<App />);
    const checkbox = screen.getByRole("checkbox", { name: "Balance stacks" });
    expect(checkbox).toBeChecked();
    fireEvent.click(checkbox);
    expect(checkbox).not.toBeChecked();
  });

  it("draws the ascii preview", () => {
    render(<App />);
    const lines = (screen.getByLabelText("ASCII preview").textContent ?? "").split("\n");
    expect(lines).toHaveLength(17);
    expect(lines[0]).toBe(`+${"-".repeat(23)}+${"-".repeat(23)}+`);
    expect(lines[1]).toBe(`|1${" ".repeat(22)}|2${" ".repeat(22)}|`);
  });

  it("restores stored preferences", () => {
    window.localStorage.setItem(
      PREFS_STORAGE_KEY,
      JSON.stringify({ layoutName: "Grid", windowCount: 4, config: { columnType: "stack", stackSplit: "grid" } })
    );
    render(<App />);
    expect(screen.getByRole("status")).toHaveTextContent("Grid: 4 windows, no main column");
    expect(screen.getAllByRole("listitem").map((item) => item.style.width)).toEqual(["50%", "50%", "50%", "50%"]);
  });

  it("falls back to defaults for unreadable preferences", () => {
    window.localStorage.setItem(PREFS_STORAGE_KEY, "{oops");
    const { unmount } = render(<App />);
    expect(screen.getByRole("combobox", { name: "Layout" })).toHaveValue("MainAndVertStack");
    unmount();

    window.localStorage.setItem(
      PREFS_STORAGE_KEY,
      JSON.stringify({ layoutName: "Spiral", windowCount: 2, config: {} })
    );
    render(<App />);
    expect(screen.getByRole("status")).toHaveTextContent("MainAndVertStack: 3 windows, 1 main at 50%");
  });
});
