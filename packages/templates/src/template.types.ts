import type { Variables } from "@promptweave/types";

export type TemplateFormat = "fstring" | "jinja2";

export type TemplateVariables = Variables;

export interface PromptTemplateOptions {
  format?: TemplateFormat;
  /**
   * Required variable names. Inferred from the template when omitted; for
   * `fstring` templates every referenced name must be listed.
   */
  inputVariables?: readonly string[];
  /** Values bound ahead of time; callers may still override them. */
  partialVariables?: TemplateVariables;
}

export interface TemplateDescriptor {
  file: string;
  baseDir?: string;
  encoding?: BufferEncoding;
  format?: TemplateFormat;
  variables?: TemplateVariables;
}
