import type nunjucks from "nunjucks";
import {
  MalformedTemplateError,
  MissingVariableError,
  hasVariable,
  isDocument,
  isMessageList,
  stringPrompt,
  type PromptValue,
  type VariableValue,
  type Variables,
} from "@promptweave/types";
import { fStringVariables, parseFString, type FStringSegment } from "./fstring";
import {
  UNDEFINED_OUTPUT_MESSAGE,
  compileJinja,
  findUnresolvedReference,
  jinjaVariables,
} from "./jinja";
import { renderValue } from "./render-value";
import type {
  PromptTemplateOptions,
  TemplateFormat,
  TemplateVariables,
} from "./template.types";

/** Anything that turns a variable mapping into a prompt for a model. */
export interface PromptFormatter {
  readonly inputVariables: readonly string[];
  formatPrompt(variables: Variables): PromptValue;
}

type CompiledTemplate =
  | { format: "fstring"; segments: FStringSegment[] }
  | { format: "jinja2"; template: nunjucks.Template };

export class PromptTemplate implements PromptFormatter {
  readonly format: TemplateFormat;
  readonly inputVariables: readonly string[];
  readonly partialVariables: TemplateVariables;
  private readonly compiled: CompiledTemplate;

  constructor(
    readonly template: string,
    options: PromptTemplateOptions = {},
    compiled?: nunjucks.Template
  ) {
    this.format = options.format ?? "fstring";
    this.partialVariables = Object.freeze({ ...(options.partialVariables ?? {}) });

    let referenced: string[];
    if (this.format === "fstring") {
      const segments = parseFString(template);
      referenced = fStringVariables(segments);
      this.compiled = { format: "fstring", segments };
    } else {
      this.compiled = { format: "jinja2", template: compiled ?? compileJinja(template) };
      referenced = jinjaVariables(template);
    }

    const declared = options.inputVariables ?? referenced;
    if (options.inputVariables && this.format === "fstring") {
      const undeclared = referenced.filter((name) => !declared.includes(name));
      if (undeclared.length > 0) {
        throw new MalformedTemplateError(
          template,
          `references undeclared variable(s): ${undeclared.join(", ")}`
        );
      }
    }

    this.inputVariables = Object.freeze(
      declared.filter((name) => !(name in this.partialVariables))
    );
  }

  static fromTemplate(template: string, options?: PromptTemplateOptions): PromptTemplate {
    return new PromptTemplate(template, options);
  }

  /** Returns a copy with some variables bound up front. */
  partial(variables: TemplateVariables): PromptTemplate {
    return new PromptTemplate(
      this.template,
      {
        format: this.format,
        inputVariables: [...this.inputVariables, ...Object.keys(this.partialVariables)],
        partialVariables: { ...this.partialVariables, ...variables },
      },
      this.compiled.format === "jinja2" ? this.compiled.template : undefined
    );
  }

  /** Fails with `MissingVariableError` naming the first absent variable. */
  validate(variables: Variables): void {
    for (const name of this.inputVariables) {
      if (!hasVariable(variables, name)) {
        throw new MissingVariableError(name);
      }
    }
  }

  render(variables: Variables): string {
    const merged: Variables = { ...this.partialVariables, ...variables };
    this.validate(merged);

    if (this.compiled.format === "jinja2") {
      return this.renderJinja(this.compiled.template, merged);
    }

    return this.compiled.segments
      .map((segment) =>
        segment.type === "text" ? segment.value : renderValue(lookup(merged, segment.name))
      )
      .join("");
  }

  formatPrompt(variables: Variables): PromptValue {
    return stringPrompt(this.render(variables));
  }

  private renderJinja(template: nunjucks.Template, variables: Variables): string {
    const context = this.toJinjaContext(variables);
    try {
      return template.render(context);
    } catch (error) {
      const unresolved =
        error instanceof Error && error.message.includes(UNDEFINED_OUTPUT_MESSAGE)
          ? findUnresolvedReference(this.template, context)
          : undefined;
      if (unresolved !== undefined) {
        throw new MissingVariableError(unresolved);
      }
      throw error;
    }
  }

  private toJinjaContext(variables: Variables): Record<string, unknown> {
    const context: Record<string, unknown> = {};
    for (const [name, value] of Object.entries(variables)) {
      if (value === undefined) {
        continue;
      }
      context[name] = isRenderedList(value) ? renderValue(value) : value;
    }
    return context;
  }
}

const isRenderedList = (value: VariableValue): boolean =>
  Array.isArray(value) && (isMessageList(value) || value.every(isDocument));

function lookup(variables: Variables, name: string): VariableValue {
  const value = variables[name];
  if (value === undefined) {
    throw new MissingVariableError(name);
  }
  return value;
}
