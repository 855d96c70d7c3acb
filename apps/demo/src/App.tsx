import { useEffect, useMemo, useState } from "react";
import {
  type LayoutConfig,
  type Rect,
  decreaseMainSize,
  decreaseMainWindowCount,
  getMainSize,
  getMainWindowCount,
  hasMainColumn,
  increaseMainSize,
  increaseMainWindowCount,
  resolveLayout,
  rotateLayout,
  swapsAxes,
  toggleBalanceStacks,
  toggleFlipHorizontal,
  toggleFlipVertical
} from "@tilecraft/layout-engine";
import { LayoutRegistry } from "@tilecraft/layout-presets";
import { renderAscii } from "./ascii";
import LayoutPreview from "./LayoutPreview";
import { MAX_WINDOW_COUNT, loadPrefs, savePrefs } from "./prefs";

const registry = LayoutRegistry.withDefaults();

const SCREEN: Rect = { x: 0, y: 0, width: 1600, height: 900 };
const BAR_HEIGHT = 36;
const WORKSPACE: Rect = {
  x: SCREEN.x,
  y: SCREEN.y + BAR_HEIGHT,
  width: SCREEN.width,
  height: SCREEN.height - BAR_HEIGHT
};
const ASCII_CANVAS: Rect = { x: 0, y: 0, width: 48, height: 16 };

interface Resolved {
  rects: Rect[];
  error: string | null;
}

function resolveSafely(workspace: Rect, windowCount: number, config: LayoutConfig): Resolved {
  try {
    return { rects: resolveLayout(workspace, windowCount, config), error: null };
  } catch (error) {
    return { rects: [], error: error instanceof Error ? error.message : String(error) };
  }
}

function describeMain(config: LayoutConfig): string {
  const size = getMainSize(config);
  const count = getMainWindowCount(config);
  if (!size || count === undefined) {
    return "no main column";
  }
  const width = size.unit === "ratio" ? `${Math.round(size.value * 100)}%` : `${size.value}px`;
  return `${count} main at ${width}`;
}

export default function App() {
  const initialPrefs = useMemo(() => loadPrefs(registry), []);
  const [layoutName, setLayoutName] = useState<string>(initialPrefs.layoutName);
  const [windowCount, setWindowCount] = useState<number>(initialPrefs.windowCount);
  const [config, setConfig] = useState<LayoutConfig>(initialPrefs.config);

  const preview = useMemo(() => resolveSafely(WORKSPACE, windowCount, config), [windowCount, config]);
  const ascii = useMemo(() => {
    const { rects } = resolveSafely(ASCII_CANVAS, windowCount, config);
    return renderAscii(rects, ASCII_CANVAS.width, ASCII_CANVAS.height);
  }, [windowCount, config]);

  useEffect(() => {
    savePrefs({ layoutName, windowCount, config });
  }, [layoutName, windowCount, config]);

  const selectLayout = (name: string) => {
    const preset = registry.get(name);
    if (!preset) {
      return;
    }
    setLayoutName(name);
    setConfig(preset);
  };

  const cycleLayout = (direction: "next" | "previous") => {
    const name = direction === "next" ? registry.next(layoutName) : registry.previous(layoutName);
    if (name) {
      selectLayout(name);
    }
  };

  // pixel sizes may grow up to the width the main column is laid out in
  const mainSizeBound =
    config.mainSize.unit === "ratio" ? 1 : swapsAxes(config.rotation) ? WORKSPACE.height : WORKSPACE.width;
  const withMain = hasMainColumn(config);
  const status = preview.error ?? `${layoutName}: ${windowCount} windows, ${describeMain(config)}`;

  return (
    <main className="demo" aria-label="Tiling layout demo">
      <header className="demo__toolbar">
        <button type="button" onClick={() => cycleLayout("previous")}>
          Previous layout
        </button>
        <select aria-label="Layout" value={layoutName} onChange={(event) => selectLayout(event.target.value)}>
          {registry.names().map((name) => (
            <option key={name} value={name}>
              {name}
            </option>
          ))}
        </select>
        <button type="button" onClick={() => cycleLayout("next")}>
          Next layout
        </button>
        <button type="button" onClick={() => selectLayout(layoutName)}>
          Reset layout
        </button>
      </header>

      <section className="demo__controls" aria-label="Layout controls">
        <button
          type="button"
          disabled={windowCount >= MAX_WINDOW_COUNT}
          onClick={() => setWindowCount((count) => Math.min(MAX_WINDOW_COUNT, count + 1))}
        >
          Add window
        </button>
        <button
          type="button"
          disabled={windowCount === 0}
          onClick={() => setWindowCount((count) => Math.max(0, count - 1))}
        >
          Remove window
        </button>
        <button type="button" disabled={!withMain} onClick={() => setConfig((current) => increaseMainSize(current, mainSizeBound))}>
          Grow main
        </button>
        <button type="button" disabled={!withMain} onClick={() => setConfig(decreaseMainSize)}>
          Shrink main
        </button>
        <button type="button" disabled={!withMain} onClick={() => setConfig(increaseMainWindowCount)}>
          More main windows
        </button>
        <button type="button" disabled={!withMain} onClick={() => setConfig(decreaseMainWindowCount)}>
          Fewer main windows
        </button>
        <button type="button" onClick={() => setConfig(toggleFlipHorizontal)}>
          Flip horizontally
        </button>
        <button type="button" onClick={() => setConfig(toggleFlipVertical)}>
          Flip vertically
        </button>
        <button type="button" onClick={() => setConfig((current) => rotateLayout(current, true))}>
          Rotate
        </button>
        <label>
          <input
            type="checkbox"
            checked={config.balanceStacks}
            onChange={() => setConfig(toggleBalanceStacks)}
          />
          Balance stacks
        </label>
      </section>

      <p className="demo__status" role="status">
        {status}
      </p>

      <LayoutPreview workspace={WORKSPACE} rects={preview.rects} />

      <pre className="demo__ascii" aria-label="ASCII preview">
        {ascii}
      </pre>
    </main>
  );
}
