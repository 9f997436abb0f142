import type { Logger } from "pino";
import { DEFAULT_OUTPUT_KEY } from "@promptweave/config";
import { DummyMemory } from "@promptweave/memory";
import { renderValue } from "@promptweave/templates";
import {
  MissingVariableError,
  aiMessage,
  humanMessage,
  type InvocationOptions,
  type Memory,
  type OutputVariables,
  type Retriever,
  type Variables,
} from "@promptweave/types";
import { throwIfAborted } from "../model/cancellation";
import { BaseChain, type Chain } from "./chain";
import type { StuffDocumentsChain } from "./stuff-documents.chain";

export interface ConversationalRetrievalChainOptions {
  retriever: Retriever;
  combineDocumentsChain: StuffDocumentsChain;
  /**
   * Rewrites the question into a standalone one using `chat_history` and
   * `question`. Skipped while the history is empty.
   */
  questionGenerator?: Chain;
  memory?: Memory;
  inputKey?: string;
  outputKey?: string;
  returnSourceDocuments?: boolean;
  returnGeneratedQuestion?: boolean;
  logger?: Logger;
}

export const SOURCE_DOCUMENTS_KEY = "source_documents";
export const GENERATED_QUESTION_KEY = "generated_question";
export const CHAT_HISTORY_KEY = "chat_history";

/**
 * Retrieves documents for the (optionally condensed) question, stuffs them
 * into the answering chain and records the turn in memory.
 */
export class ConversationalRetrievalChain extends BaseChain {
  readonly memory: Memory;
  readonly inputKey: string;
  readonly outputKey: string;
  readonly inputKeys: readonly string[];
  readonly outputKeys: readonly string[];
  private readonly retriever: Retriever;
  private readonly combineDocumentsChain: StuffDocumentsChain;
  private readonly questionGenerator?: Chain;
  private readonly returnSourceDocuments: boolean;
  private readonly returnGeneratedQuestion: boolean;

  constructor(options: ConversationalRetrievalChainOptions) {
    super({ logger: options.logger });
    this.retriever = options.retriever;
    this.combineDocumentsChain = options.combineDocumentsChain;
    this.questionGenerator = options.questionGenerator;
    this.memory = options.memory ?? new DummyMemory();
    this.inputKey = options.inputKey ?? "question";
    this.outputKey = options.outputKey ?? DEFAULT_OUTPUT_KEY;
    this.returnSourceDocuments = options.returnSourceDocuments ?? false;
    this.returnGeneratedQuestion = options.returnGeneratedQuestion ?? false;

    this.inputKeys = Object.freeze([this.inputKey]);
    this.outputKeys = Object.freeze([
      this.outputKey,
      ...(this.returnSourceDocuments ? [SOURCE_DOCUMENTS_KEY] : []),
      ...(this.returnGeneratedQuestion ? [GENERATED_QUESTION_KEY] : []),
    ]);
  }

  protected async call(
    variables: Variables,
    options: InvocationOptions
  ): Promise<OutputVariables> {
    const input = variables[this.inputKey];
    if (input === undefined) {
      throw new MissingVariableError(this.inputKey);
    }
    const question = renderValue(input);
    const history = await this.memory.load();
    const { streamingSink: _streamingSink, ...innerOptions } = options;

    let standalone = question;
    if (this.questionGenerator && history.length > 0) {
      const generated = await this.questionGenerator.invoke(
        { [CHAT_HISTORY_KEY]: history, question },
        innerOptions
      );
      const primary = generated[this.questionGenerator.outputKeys[0] ?? ""];
      if (primary !== undefined) {
        standalone = renderValue(primary).trim() || question;
      }
      this.logger.debug({ question, standalone }, "Condensed question");
    }

    const documents = await this.retriever.getRelevantDocuments(standalone, {
      signal: options.signal,
    });
    this.logger.debug({ documents: documents.length }, "Retrieved documents");

    const answered = await this.combineDocumentsChain.invoke(
      {
        ...variables,
        [CHAT_HISTORY_KEY]: history,
        question: standalone,
        [this.combineDocumentsChain.inputKey]: documents,
      },
      options
    );
    const answerValue = answered[this.combineDocumentsChain.outputKeys[0] ?? ""];
    const answer = answerValue === undefined ? "" : renderValue(answerValue);

    throwIfAborted(options.signal);
    await this.memory.save(humanMessage(question), aiMessage(answer));

    const outputs: OutputVariables = { [this.outputKey]: answer };
    if (this.returnSourceDocuments) {
      outputs[SOURCE_DOCUMENTS_KEY] = documents;
    }
    if (this.returnGeneratedQuestion) {
      outputs[GENERATED_QUESTION_KEY] = standalone;
    }
    return outputs;
  }
}
