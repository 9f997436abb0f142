import {
  isDocument,
  isMessageList,
  messagesToText,
  type VariableValue,
} from "@promptweave/types";

/** Text substituted into a template for a variable value. */
export function renderValue(value: VariableValue): string {
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  if (Array.isArray(value)) {
    if (value.length === 0) {
      return "";
    }
    if (isMessageList(value)) {
      return messagesToText(value);
    }
    const documents = value.filter(isDocument);
    if (documents.length === value.length) {
      return documents.map((document) => document.pageContent).join("\n\n");
    }
  }
  return JSON.stringify(value);
}
