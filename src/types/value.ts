/**
 * Values under test. Every value the framework compares is one of these
 * variants; plain YAML/JSON data is converted with {@link fromPlain}.
 */
export type Value =
  | NullValue
  | BooleanValue
  | NumberValue
  | StringValue
  | ListValue
  | MapValue;

export interface NullValue {
  kind: "null";
}

export interface BooleanValue {
  kind: "boolean";
  value: boolean;
}

export interface NumberValue {
  kind: "number";
  value: number;
  /** Empty for unitless numbers */
  unit: string;
}

export interface StringValue {
  kind: "string";
  value: string;
  quoted: boolean;
}

export type ListSeparator = "comma" | "space";

export interface ListValue {
  kind: "list";
  items: Value[];
  separator: ListSeparator;
}

export interface MapValue {
  kind: "map";
  entries: Array<[Value, Value]>;
}

export type TypeName = "null" | "bool" | "number" | "string" | "list" | "map";

export const nil = (): NullValue => ({ kind: "null" });

export const bool = (value: boolean): BooleanValue => ({ kind: "boolean", value });

export const num = (value: number, unit = ""): NumberValue => ({
  kind: "number",
  value,
  unit,
});

export const str = (value: string, quoted = true): StringValue => ({
  kind: "string",
  value,
  quoted,
});

export const list = (items: Value[], separator: ListSeparator = "comma"): ListValue => ({
  kind: "list",
  items,
  separator,
});

export const map = (entries: Array<[Value, Value]>): MapValue => ({
  kind: "map",
  entries,
});

/**
 * Type name as shown in failure details
 */
export function typeName(value: Value): TypeName {
  switch (value.kind) {
    case "boolean":
      return "bool";
    default:
      return value.kind;
  }
}

/**
 * Convert parsed YAML/JSON data into a Value
 */
export function fromPlain(input: unknown): Value {
  if (input === null || input === undefined) {
    return nil();
  }
  if (typeof input === "boolean") {
    return bool(input);
  }
  if (typeof input === "number") {
    return num(input);
  }
  if (typeof input === "string") {
    return str(input);
  }
  if (Array.isArray(input)) {
    return list(input.map((item) => fromPlain(item)));
  }
  if (isPlainObject(input)) {
    return map(
      Object.entries(input).map(([key, item]): [Value, Value] => [
        str(key),
        fromPlain(item),
      ])
    );
  }
  return str(String(input), false);
}

function isPlainObject(input: unknown): input is Record<string, unknown> {
  if (typeof input !== "object" || input === null) return false;
  const proto: unknown = Object.getPrototypeOf(input);
  return proto === Object.prototype || proto === null;
}
