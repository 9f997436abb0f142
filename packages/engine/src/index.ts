export { throwIfAborted, raceAbort } from "./model/cancellation";
export { callModel, toModelCallOptions } from "./model/model-caller";
export { BaseChain, pickOutputs, type BaseChainOptions, type Chain } from "./chains/chain";
export { LLMChain, type LLMChainOptions } from "./chains/llm.chain";
export { SequentialChain, type SequentialChainOptions } from "./chains/sequential.chain";
export {
  ConversationalChain,
  DEFAULT_CONVERSATION_PROMPT,
  type ConversationalChainOptions,
} from "./chains/conversational.chain";
export {
  StuffDocumentsChain,
  DEFAULT_DOCUMENT_SEPARATOR,
  type StuffDocumentsChainOptions,
} from "./chains/stuff-documents.chain";
export {
  ConversationalRetrievalChain,
  CHAT_HISTORY_KEY,
  GENERATED_QUESTION_KEY,
  SOURCE_DOCUMENTS_KEY,
  type ConversationalRetrievalChainOptions,
} from "./chains/conversational-retrieval.chain";
export { VectorStoreRetriever, DEFAULT_TOP_K } from "./chains/vector-store.retriever";
export { ChainFactory } from "./chains/chain.factory";
export * from "./output-parsers";
export type { Agent } from "./agents/agent";
export {
  ConversationalAgent,
  CHAT_HISTORY_VARIABLE,
  SCRATCHPAD_VARIABLE,
  renderScratchpad,
  type ConversationalAgentOptions,
} from "./agents/conversational-agent";
export {
  AgentExecutor,
  DEFAULT_MAX_ITERATIONS,
  DEFAULT_MAX_PARSE_RETRIES,
  INTERMEDIATE_STEPS_KEY,
  type AgentExecutorOptions,
} from "./agents/agent-executor";
export { AgentExecutorFactory, type ExecutorSettings } from "./agents/agent-executor.factory";
export * from "./agents/prompts";
export { EngineModule } from "./engine.module";
