import {
  InvalidVariableError,
  MissingVariableError,
  chatPrompt,
  hasVariable,
  isMessageList,
  type Message,
  type MessageRole,
  type PromptValue,
  type Variables,
} from "@promptweave/types";
import { MessageTemplate } from "./message-template";
import type { PromptFormatter } from "./prompt-template";
import type { PromptTemplateOptions } from "./template.types";

export type TemplateNode =
  | { readonly kind: "literal"; readonly message: Message }
  | { readonly kind: "templated"; readonly template: MessageTemplate }
  | { readonly kind: "placeholder"; readonly variableName: string };

export const literal = (message: Message): TemplateNode => ({
  kind: "literal",
  message,
});

export function templated(template: MessageTemplate): TemplateNode;
export function templated(
  role: MessageRole,
  template: string,
  options?: PromptTemplateOptions
): TemplateNode;
export function templated(
  roleOrTemplate: MessageRole | MessageTemplate,
  template?: string,
  options?: PromptTemplateOptions
): TemplateNode {
  if (roleOrTemplate instanceof MessageTemplate) {
    return { kind: "templated", template: roleOrTemplate };
  }
  return {
    kind: "templated",
    template: MessageTemplate.of(roleOrTemplate, template ?? "", options),
  };
}

export const placeholder = (variableName: string): TemplateNode => ({
  kind: "placeholder",
  variableName,
});

/**
 * An ordered composition of literal, templated and history placeholder
 * nodes. Holds no state between calls, so one instance can serve concurrent
 * invocations.
 */
export class MessageFormatter implements PromptFormatter {
  readonly nodes: readonly TemplateNode[];
  readonly inputVariables: readonly string[];

  constructor(nodes: readonly TemplateNode[]) {
    this.nodes = Object.freeze([...nodes]);

    const names = new Set<string>();
    for (const node of this.nodes) {
      if (node.kind === "templated") {
        node.template.inputVariables.forEach((name) => names.add(name));
      } else if (node.kind === "placeholder") {
        names.add(node.variableName);
      }
    }
    this.inputVariables = Object.freeze(Array.from(names));
  }

  static fromNodes(...nodes: TemplateNode[]): MessageFormatter {
    return new MessageFormatter(nodes);
  }

  /** Checks every node before anything is rendered. */
  validate(variables: Variables): void {
    for (const node of this.nodes) {
      if (node.kind === "templated") {
        node.template.validate(variables);
      } else if (node.kind === "placeholder") {
        this.historyFor(node.variableName, variables);
      }
    }
  }

  formatMessages(variables: Variables): Message[] {
    this.validate(variables);

    const messages: Message[] = [];
    for (const node of this.nodes) {
      switch (node.kind) {
        case "literal":
          messages.push(node.message);
          break;
        case "templated":
          messages.push(node.template.format(variables));
          break;
        case "placeholder":
          messages.push(...this.historyFor(node.variableName, variables));
          break;
      }
    }
    return messages;
  }

  formatPrompt(variables: Variables): PromptValue {
    return chatPrompt(this.formatMessages(variables));
  }

  private historyFor(name: string, variables: Variables): readonly Message[] {
    if (!hasVariable(variables, name)) {
      throw new MissingVariableError(name);
    }
    const value = variables[name];
    if (!isMessageList(value)) {
      throw new InvalidVariableError(name, "a sequence of messages");
    }
    return value;
  }
}
