import type { Message } from "./messages";
import type { Document } from "./retrieval";

/**
 * Values a chain or template can read from its variable mapping: text and
 * scalars, message or document sequences, and nested mappings.
 */
export type VariableValue =
  | string
  | number
  | boolean
  | null
  | readonly Message[]
  | readonly Document[]
  | readonly VariableValue[]
  | { readonly [key: string]: VariableValue | undefined };

export type Variables = Readonly<Record<string, VariableValue | undefined>>;

export type OutputVariables = Record<string, VariableValue>;

export function hasVariable(variables: Variables, name: string): boolean {
  return Object.prototype.hasOwnProperty.call(variables, name) &&
    variables[name] !== undefined;
}
