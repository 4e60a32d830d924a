import { z } from "zod";

// Comment markers per block type; END_ markers are derived
const MarkersSchema = z.object({
  assert: z.string().min(1).default("ASSERT"),
  output: z.string().min(1).default("OUTPUT"),
  expect: z.string().min(1).default("EXPECTED"),
  contains: z.string().min(1).default("CONTAINED"),
  "contains-string": z.string().min(1).default("CONTAINS_STRING"),
}).strict();

const SymbolsSchema = z.object({
  pass: z.string().default("✔"),
  fail: z.string().default("✖"),
  output: z.string().default("▶"),
}).strict();

const OutputSchema = z.object({
  selector: z.string().min(1).default(".test-output"),
  // Echo failure details to the terminal as warnings
  terminal: z.boolean().default(true),
  // Print actual/expected values in failure details
  details: z.boolean().default(true),
}).strict();

export const ProjectConfigSchema = z.object({
  version: z.string().default("1.0"),
  output: OutputSchema.default({}),
  markers: MarkersSchema.default({}),
  symbols: SymbolsSchema.default({}),
}).strict();

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;
export type Markers = z.infer<typeof MarkersSchema>;
export type Symbols = z.infer<typeof SymbolsSchema>;

export const DEFAULT_CONFIG: ProjectConfig = ProjectConfigSchema.parse({});
