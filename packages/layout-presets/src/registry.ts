import type { LayoutConfig } from "@tilecraft/layout-engine";
import defaultDefinitions from "./presets.json";
import { type LayoutPreset, parseLayoutDefinitions, parseLayoutDefinitionsJson } from "./schema";

export const DEFAULT_PRESETS: readonly LayoutPreset[] = parseLayoutDefinitions(defaultDefinitions);

/** Ordered, name-addressed collection of layout presets. */
export class LayoutRegistry {
  private readonly presets: LayoutPreset[];

  constructor(presets: readonly LayoutPreset[] = []) {
    this.presets = [];
    for (const preset of presets) {
      this.upsert(preset);
    }
  }

  static withDefaults(): LayoutRegistry {
    return new LayoutRegistry(DEFAULT_PRESETS);
  }

  /**
   * Layers user definitions (a JSON array) on top of the defaults. A
   * definition whose name matches a default replaces it in place; new names
   * are appended.
   */
  static fromJson(json: string, options: { includeDefaults?: boolean } = {}): LayoutRegistry {
    const { includeDefaults = true } = options;
    const registry = includeDefaults ? LayoutRegistry.withDefaults() : new LayoutRegistry();
    for (const preset of parseLayoutDefinitionsJson(json)) {
      registry.upsert(preset);
    }
    return registry;
  }

  get size(): number {
    return this.presets.length;
  }

  get(name: string): LayoutConfig | undefined {
    return this.presets.find((preset) => preset.name === name)?.config;
  }

  names(): string[] {
    return this.presets.map((preset) => preset.name);
  }

  indexOf(name: string): number | undefined {
    const index = this.presets.findIndex((preset) => preset.name === name);
    return index === -1 ? undefined : index;
  }

  upsert(preset: LayoutPreset): void {
    const index = this.indexOf(preset.name);
    if (index === undefined) {
      this.presets.push(preset);
      return;
    }
    this.presets[index] = preset;
  }

  /** Name after `name`, wrapping around. Unknown names start at the first preset. */
  next(name: string): string | undefined {
    return this.step(name, 1);
  }

  /** Name before `name`, wrapping around. Unknown names start at the last preset. */
  previous(name: string): string | undefined {
    return this.step(name, -1);
  }

  private step(name: string, offset: 1 | -1): string | undefined {
    if (this.presets.length === 0) {
      return undefined;
    }
    const index = this.indexOf(name);
    if (index === undefined) {
      return this.presets[offset === 1 ? 0 : this.presets.length - 1].name;
    }
    return this.presets[(index + offset + this.presets.length) % this.presets.length].name;
  }
}
