import { type LayoutConfig, createLayoutConfig } from "@tilecraft/layout-engine";
import { z } from "zod";

export class PresetParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PresetParseError";
  }
}

const defaults = createLayoutConfig();

export const SplitSchema = z.enum(["none", "horizontal", "vertical", "grid", "fibonacci", "dwindle"]);
export const ColumnTypeSchema = z.enum(["stack", "mainAndStack", "centerMain"]);
export const FlipSchema = z.enum(["none", "horizontal", "vertical", "both"]);
export const RotationSchema = z.enum(["north", "east", "south", "west"]);
export const ReserveColumnSpaceSchema = z.enum(["none", "reserve", "reserveAndCenter"]);

export const SizeSchema = z.discriminatedUnion("unit", [
  z.object({ unit: z.literal("ratio"), value: z.number().min(0).max(1) }),
  z.object({ unit: z.literal("pixel"), value: z.number().int().min(0) })
]);

/**
 * One named layout as users write it. Every field but `name` is optional and
 * falls back to the {@link createLayoutConfig} default.
 */
export const LayoutDefinitionSchema = z
  .object({
    name: z.string().trim().min(1),
    columnType: ColumnTypeSchema.default(defaults.columnType),
    mainSplit: SplitSchema.default(defaults.mainSplit),
    stackSplit: SplitSchema.default(defaults.stackSplit),
    secondStackSplit: SplitSchema.default(defaults.secondStackSplit),
    mainWindowCount: z.number().int().min(0).default(defaults.mainWindowCount),
    mainSize: SizeSchema.default(defaults.mainSize),
    flipped: FlipSchema.default(defaults.flipped),
    rotation: RotationSchema.default(defaults.rotation),
    mainFlip: FlipSchema.default(defaults.mainFlip),
    mainRotation: RotationSchema.default(defaults.mainRotation),
    stackFlip: FlipSchema.default(defaults.stackFlip),
    stackRotation: RotationSchema.default(defaults.stackRotation),
    secondStackFlip: FlipSchema.default(defaults.secondStackFlip),
    secondStackRotation: RotationSchema.default(defaults.secondStackRotation),
    reserveColumnSpace: ReserveColumnSpaceSchema.default(defaults.reserveColumnSpace),
    balanceStacks: z.boolean().default(defaults.balanceStacks)
  })
  .strict();

export type LayoutDefinition = z.input<typeof LayoutDefinitionSchema>;

export interface LayoutPreset {
  name: string;
  config: LayoutConfig;
}

function toPreset({ name, ...config }: z.output<typeof LayoutDefinitionSchema>): LayoutPreset {
  return { name, config: createLayoutConfig(config) };
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

export function parseLayoutDefinitions(input: unknown): LayoutPreset[] {
  const parsed = z.array(LayoutDefinitionSchema).safeParse(input);
  if (!parsed.success) {
    throw new PresetParseError(`Invalid layout definitions: ${describeIssues(parsed.error)}`);
  }
  return parsed.data.map(toPreset);
}

export function parseLayoutDefinitionsJson(json: string): LayoutPreset[] {
  let input: unknown;
  try {
    input = JSON.parse(json);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new PresetParseError(`Layout definitions are not valid JSON: ${reason}`);
  }
  return parseLayoutDefinitions(input);
}
