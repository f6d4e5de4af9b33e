/**
 * Help screen for a script's declared parameters.
 *
 * @example
 * ```
 * -------------
 * import v. 1.2
 * -------------
 *
 *   Imports records.
 *
 * Parameters
 * ----------
 *
 *   * items (n) [integer]; default: 100
 *
 *     Number of items
 * ```
 *
 * @module io/help
 */

import { formatTime } from "../lib/duration.js";
import { textAlign, textIndent } from "../lib/text.js";
import { type ParameterDeclaration, parseDurationSeconds } from "./arguments.js";

export interface HelpOptions {
  scriptName: string;
  scriptVersion: string;
  description?: string | undefined;
  maxOutputWidth: number;
  parameters: readonly ParameterDeclaration[];
}

/**
 * Type name and rendered default of a parameter.
 */
export function describeParameterType(declaration: ParameterDeclaration): { typeName: string; defaultValue: string } {
  switch (declaration.type) {
    case "integer":
      return { typeName: "integer", defaultValue: String(declaration.default) };
    case "string":
      return { typeName: "string", defaultValue: `"${declaration.default}"` };
    case "boolean":
      return { typeName: "boolean", defaultValue: declaration.default ? "true" : "false" };
    case "array":
      return { typeName: "array", defaultValue: declaration.default.join("+") };
    case "duration":
      return {
        typeName: "time in seconds",
        defaultValue: `${declaration.default} (${formatTime(parseDurationSeconds(declaration.default))})`,
      };
  }
}

function underlined(text: string): string {
  return `${text}\n${"-".repeat(text.length)}`;
}

function renderParameter(declaration: ParameterDeclaration, width: number): string {
  const { typeName, defaultValue } = describeParameterType(declaration);
  const alias = declaration.alias ? ` (${declaration.alias})` : "";
  const usage = `  * ${declaration.name}${alias} [${typeName}]; default: ${defaultValue}`;

  if (!declaration.description) return usage;

  const description = textAlign(declaration.description, { width: width - 4 });
  return `${usage}\n\n${textIndent(description, "  ", 2)}`;
}

/**
 * Render the help screen: title framed by dashes, description, then one entry
 * per parameter.
 */
export function renderHelp(options: HelpOptions): string {
  const { scriptName, scriptVersion, description, maxOutputWidth, parameters } = options;

  const title = `${scriptName} v. ${scriptVersion}`;
  const rule = "-".repeat(title.length);
  const sections = [`${rule}\n${title}\n${rule}`];

  if (description) {
    sections.push(textIndent(textAlign(description, { width: maxOutputWidth - 2 }), "  ", 1));
  }

  if (parameters.length > 0) {
    sections.push(underlined("Parameters"));
    for (const parameter of parameters) {
      sections.push(renderParameter(parameter, maxOutputWidth));
    }
  }

  return `${sections.join("\n\n")}\n`;
}
