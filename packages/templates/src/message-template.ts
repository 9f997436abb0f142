import {
  createMessage,
  type Message,
  type MessageRole,
  type Variables,
} from "@promptweave/types";
import { PromptTemplate } from "./prompt-template";
import type { PromptTemplateOptions } from "./template.types";

/** A message whose content is produced by a prompt template. */
export class MessageTemplate {
  constructor(
    readonly role: MessageRole,
    readonly prompt: PromptTemplate,
    readonly metadata: Record<string, unknown> = {}
  ) {}

  static of(
    role: MessageRole,
    template: string,
    options?: PromptTemplateOptions
  ): MessageTemplate {
    return new MessageTemplate(role, new PromptTemplate(template, options));
  }

  static system(template: string, options?: PromptTemplateOptions): MessageTemplate {
    return MessageTemplate.of("system", template, options);
  }

  static human(template: string, options?: PromptTemplateOptions): MessageTemplate {
    return MessageTemplate.of("human", template, options);
  }

  static ai(template: string, options?: PromptTemplateOptions): MessageTemplate {
    return MessageTemplate.of("ai", template, options);
  }

  static tool(template: string, options?: PromptTemplateOptions): MessageTemplate {
    return MessageTemplate.of("tool", template, options);
  }

  get inputVariables(): readonly string[] {
    return this.prompt.inputVariables;
  }

  validate(variables: Variables): void {
    this.prompt.validate(variables);
  }

  format(variables: Variables): Message {
    return createMessage({
      role: this.role,
      content: this.prompt.render(variables),
      metadata: this.metadata,
    });
  }
}
