import { type LayoutConfig, createLayoutConfig } from "@tilecraft/layout-engine";
import { LayoutDefinitionSchema, type LayoutRegistry } from "@tilecraft/layout-presets";
import { z } from "zod";

export const PREFS_STORAGE_KEY = "tilecraft.demo.prefs.v1";
export const DEFAULT_LAYOUT_NAME = "MainAndVertStack";
export const DEFAULT_WINDOW_COUNT = 3;
export const MAX_WINDOW_COUNT = 32;

export interface DemoPrefs {
  layoutName: string;
  windowCount: number;
  config: LayoutConfig;
}

const StoredPrefsSchema = z.object({
  layoutName: z.string(),
  windowCount: z.number().int().min(0).max(MAX_WINDOW_COUNT),
  config: LayoutDefinitionSchema.omit({ name: true })
});

export function defaultPrefs(registry: LayoutRegistry): DemoPrefs {
  const [first = DEFAULT_LAYOUT_NAME] = registry.names();
  const layoutName = registry.get(DEFAULT_LAYOUT_NAME) ? DEFAULT_LAYOUT_NAME : first;
  return {
    layoutName,
    windowCount: DEFAULT_WINDOW_COUNT,
    config: registry.get(layoutName) ?? createLayoutConfig()
  };
}

export function loadPrefs(registry: LayoutRegistry): DemoPrefs {
  if (typeof window === "undefined") {
    return defaultPrefs(registry);
  }

  try {
    const raw = window.localStorage.getItem(PREFS_STORAGE_KEY);
    if (!raw) {
      return defaultPrefs(registry);
    }

    const parsed = StoredPrefsSchema.safeParse(JSON.parse(raw));
    if (!parsed.success || registry.indexOf(parsed.data.layoutName) === undefined) {
      return defaultPrefs(registry);
    }
    return parsed.data;
  } catch {
    return defaultPrefs(registry);
  }
}

export function savePrefs(prefs: DemoPrefs): void {
  window.localStorage.setItem(PREFS_STORAGE_KEY, JSON.stringify(prefs));
}
