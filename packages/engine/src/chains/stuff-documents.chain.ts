import type { Logger } from "pino";
import { PromptTemplate, type PromptFormatter } from "@promptweave/templates";
import {
  InvalidVariableError,
  MissingVariableError,
  isDocumentList,
  promptToString,
  type Document,
  type InvocationOptions,
  type OutputVariables,
  type Variables,
} from "@promptweave/types";
import { BaseChain, type Chain } from "./chain";

export const DEFAULT_DOCUMENT_SEPARATOR = "\n\n";

export interface StuffDocumentsChainOptions {
  /** Chain that answers from the stuffed context. */
  llmChain: Chain;
  inputKey?: string;
  documentVariableName?: string;
  separator?: string;
  /** Renders one document; receives `page_content`. */
  documentPrompt?: PromptFormatter;
  logger?: Logger;
}

/** Joins every input document into one context variable for a single call. */
export class StuffDocumentsChain extends BaseChain {
  readonly inputKey: string;
  readonly documentVariableName: string;
  readonly separator: string;
  readonly inputKeys: readonly string[];
  readonly outputKeys: readonly string[];
  private readonly llmChain: Chain;
  private readonly documentPrompt: PromptFormatter;

  constructor(options: StuffDocumentsChainOptions) {
    super({ logger: options.logger });
    this.llmChain = options.llmChain;
    this.inputKey = options.inputKey ?? "input_documents";
    this.documentVariableName = options.documentVariableName ?? "context";
    this.separator = options.separator ?? DEFAULT_DOCUMENT_SEPARATOR;
    this.documentPrompt =
      options.documentPrompt ?? PromptTemplate.fromTemplate("{page_content}");

    this.inputKeys = Object.freeze([
      this.inputKey,
      ...this.llmChain.inputKeys.filter((key) => key !== this.documentVariableName),
    ]);
    this.outputKeys = this.llmChain.outputKeys;
  }

  stuff(documents: readonly Document[]): string {
    return documents
      .map((document) =>
        promptToString(this.documentPrompt.formatPrompt({ page_content: document.pageContent }))
      )
      .join(this.separator);
  }

  protected async call(
    variables: Variables,
    options: InvocationOptions
  ): Promise<OutputVariables> {
    const documents = this.documentsFrom(variables);
    this.logger.debug({ documents: documents.length }, "Stuffing documents");
    return this.llmChain.invoke(
      { ...variables, [this.documentVariableName]: this.stuff(documents) },
      options
    );
  }

  private documentsFrom(variables: Variables): readonly Document[] {
    const value = variables[this.inputKey];
    if (value === undefined) {
      throw new MissingVariableError(this.inputKey);
    }
    if (!isDocumentList(value)) {
      throw new InvalidVariableError(this.inputKey, "a sequence of documents");
    }
    return value;
  }
}
