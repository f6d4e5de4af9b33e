/**
 * Command-line parameters.
 *
 * Arguments are written as `name:value` (`name` alone means an empty value) and
 * matched against declared parameters by name, then by alias. Each declaration
 * names its type up front; values are never typed by guessing from a default.
 *
 * Parsing is lazy: values are read on first access and again after a new
 * declaration.
 *
 * @module io/arguments
 */

import { explodeString, strToBool } from "../lib/text.js";

interface DeclarationBase {
  name: string;
  alias?: string | undefined;
  description?: string | undefined;
}

export interface IntegerParameter extends DeclarationBase {
  type: "integer";
  default: number;
}

export interface StringParameter extends DeclarationBase {
  type: "string";
  default: string;
}

export interface BooleanParameter extends DeclarationBase {
  type: "boolean";
  default: boolean;
}

/** `+`-separated list; quoted items may contain `+` */
export interface ArrayParameter extends DeclarationBase {
  type: "array";
  default: string[];
}

/** `<int><unit>` with unit s, m, h, d or w (none means seconds); read as seconds */
export interface DurationParameter extends DeclarationBase {
  type: "duration";
  default: string;
}

export type ParameterDeclaration =
  | IntegerParameter
  | StringParameter
  | BooleanParameter
  | ArrayParameter
  | DurationParameter;

export type ParameterType = ParameterDeclaration["type"];

export type ParameterValue = number | string | boolean | string[];

export class ParameterError extends Error {
  override readonly name = "ParameterError";
}

const DURATION_UNITS: Record<string, number> = {
  "": 1,
  s: 1,
  m: 60,
  h: 60 * 60,
  d: 60 * 60 * 24,
  w: 60 * 60 * 24 * 7,
};

const LEADING_INTEGER = /^\s*([+-]?\d+)/;

/**
 * Read the leading integer of a string; anything unreadable is 0.
 *
 * @example
 * ```typescript
 * parseLeadingInteger("12abc"); // 12
 * parseLeadingInteger("abc"); // 0
 * ```
 */
export function parseLeadingInteger(raw: string): number {
  const match = LEADING_INTEGER.exec(raw);
  return match?.[1] === undefined ? 0 : Number.parseInt(match[1], 10);
}

/**
 * Convert a duration such as "90", "15m" or "2h" to seconds.
 *
 * @throws ParameterError for a unit other than s, m, h, d or w
 */
export function parseDurationSeconds(raw: string): number {
  const match = /^\s*([+-]?\d+)\s*(\S*)/.exec(raw);
  if (match?.[1] === undefined) return 0;

  const unit = (match[2] ?? "").toLowerCase();
  const multiplier = DURATION_UNITS[unit];
  if (multiplier === undefined) {
    throw new ParameterError(`Unknown time unit "${unit}" in "${raw}"`);
  }
  return Number.parseInt(match[1], 10) * multiplier;
}

/**
 * Split raw arguments into a name → value map. Later duplicates win.
 *
 * @example
 * ```typescript
 * tokenizeArguments(["n:10", "help", "path:c:/tmp"]);
 * // Map { "n" => "10", "help" => "", "path" => "c:/tmp" }
 * ```
 */
export function tokenizeArguments(argv: readonly string[]): Map<string, string> {
  const args = new Map<string, string>();
  for (const arg of argv) {
    const colon = arg.indexOf(":");
    if (colon === -1) {
      args.set(arg, "");
    } else {
      args.set(arg.slice(0, colon), arg.slice(colon + 1));
    }
  }
  return args;
}

function readValue(declaration: ParameterDeclaration, raw: string | undefined): ParameterValue {
  switch (declaration.type) {
    case "integer":
      return raw === undefined ? declaration.default : parseLeadingInteger(raw);
    case "string":
      return raw ?? declaration.default;
    case "boolean":
      if (raw === undefined) return declaration.default;
      // A bare flag ("help") switches the parameter on
      return raw === "" ? true : strToBool(raw);
    case "array":
      return raw === undefined ? [...declaration.default] : explodeString(raw, "+");
    case "duration":
      return parseDurationSeconds(raw ?? declaration.default);
  }
}

/**
 * Declared parameters and their values for one set of arguments.
 */
export class ParameterSet {
  private readonly declarations = new Map<string, ParameterDeclaration>();
  private parsed: Map<string, ParameterValue> | undefined;

  constructor(private readonly argv: readonly string[]) {}

  /**
   * Declare (or redeclare) a parameter. Values are re-read on next access.
   */
  declare(declaration: ParameterDeclaration): this {
    this.declarations.set(declaration.name, declaration);
    this.parsed = undefined;
    return this;
  }

  /**
   * Declarations in the order they were first made.
   */
  get declared(): ParameterDeclaration[] {
    return [...this.declarations.values()];
  }

  /**
   * Find a declaration by name, then by alias.
   */
  find(nameOrAlias: string): ParameterDeclaration | undefined {
    const byName = this.declarations.get(nameOrAlias);
    if (byName) return byName;
    return this.declared.find((declaration) => declaration.alias !== undefined && declaration.alias === nameOrAlias);
  }

  /**
   * Value of a parameter by name or alias.
   *
   * @throws ParameterError when no such parameter is declared
   */
  get(nameOrAlias: string): ParameterValue {
    const declaration = this.find(nameOrAlias);
    const value = declaration && this.read().get(declaration.name);
    if (value === undefined) {
      throw new ParameterError(`Parameter "${nameOrAlias}" is not declared`);
    }
    return value;
  }

  /**
   * Integer or duration parameter value (durations read as seconds).
   */
  getInteger(nameOrAlias: string): number {
    const value = this.get(nameOrAlias);
    if (typeof value !== "number") throw this.mismatch(nameOrAlias, "a number");
    return value;
  }

  getString(nameOrAlias: string): string {
    const value = this.get(nameOrAlias);
    if (typeof value !== "string") throw this.mismatch(nameOrAlias, "a string");
    return value;
  }

  getBoolean(nameOrAlias: string): boolean {
    const value = this.get(nameOrAlias);
    if (typeof value !== "boolean") throw this.mismatch(nameOrAlias, "a boolean");
    return value;
  }

  getArray(nameOrAlias: string): string[] {
    const value = this.get(nameOrAlias);
    if (!Array.isArray(value)) throw this.mismatch(nameOrAlias, "an array");
    return [...value];
  }

  /**
   * All values keyed by parameter name.
   */
  values(): Record<string, ParameterValue> {
    return Object.fromEntries(this.read());
  }

  private read(): Map<string, ParameterValue> {
    if (this.parsed) return this.parsed;

    const args = tokenizeArguments(this.argv);
    const parsed = new Map<string, ParameterValue>();
    for (const declaration of this.declarations.values()) {
      const raw =
        args.get(declaration.name) ?? (declaration.alias ? args.get(declaration.alias) : undefined);
      parsed.set(declaration.name, readValue(declaration, raw));
    }

    this.parsed = parsed;
    return parsed;
  }

  private mismatch(nameOrAlias: string, expected: string): ParameterError {
    return new ParameterError(`Parameter "${nameOrAlias}" is not ${expected}`);
  }
}
