import { z } from "zod";

const HookSchema = z.object({
  cmd: z.array(z.string()).min(1),
  timeout_ms: z.number().optional(),
  env: z.record(z.string()).optional(),
}).strict();

// Present in the file, though it may be null
const OperandSchema = z.unknown().refine((value) => value !== undefined, {
  message: "Required",
});

const DeclarationsSchema = z.union([z.string(), z.array(z.string())]);

const EqualAssertSchema = z.object({
  type: z.enum(["equal", "unequal"]),
  actual: OperandSchema,
  expected: OperandSchema,
  description: z.string().optional(),
  inspect: z.boolean().optional(),
}).strict();

const TruthyAssertSchema = z.object({
  type: z.enum(["truthy", "falsy"]),
  value: OperandSchema,
  description: z.string().optional(),
}).strict();

const OutputAssertSchema = z.object({
  type: z.literal("output"),
  description: z.string().optional(),
  output: DeclarationsSchema,
  expect: DeclarationsSchema.optional(),
  contains: DeclarationsSchema.optional(),
  contains_string: DeclarationsSchema.optional(),
}).strict().refine(
  (a) => a.expect !== undefined || a.contains !== undefined || a.contains_string !== undefined,
  { message: "output assertion needs expect, contains or contains_string" }
);

const AssertionSchema = z.union([
  EqualAssertSchema,
  TruthyAssertSchema,
  OutputAssertSchema,
]);

const TestCaseSchema = z.object({
  name: z.string(),
  assert: z.array(AssertionSchema).min(1),
}).strict();

export const TestFileSchema = z.object({
  version: z.string(),
  name: z.string(),
  hooks: z.array(HookSchema).optional(),
  tests: z.array(TestCaseSchema).min(1),
}).strict();

export type TestFile = z.infer<typeof TestFileSchema>;
export type TestCase = z.infer<typeof TestCaseSchema>;
export type Assertion = z.infer<typeof AssertionSchema>;
export type EqualAssert = z.infer<typeof EqualAssertSchema>;
export type TruthyAssert = z.infer<typeof TruthyAssertSchema>;
export type OutputAssert = z.infer<typeof OutputAssertSchema>;
export type Hook = z.infer<typeof HookSchema>;
export type Declarations = z.infer<typeof DeclarationsSchema>;

// Type guards
export function isEqualAssert(assertion: Assertion): assertion is EqualAssert {
  return assertion.type === "equal" || assertion.type === "unequal";
}

export function isTruthyAssert(assertion: Assertion): assertion is TruthyAssert {
  return assertion.type === "truthy" || assertion.type === "falsy";
}

export function isOutputAssert(assertion: Assertion): assertion is OutputAssert {
  return assertion.type === "output";
}
