import { Inject, Injectable, Optional } from "@nestjs/common";
import type { Logger } from "pino";
import { ConfigStore } from "@promptweave/config";
import { LoggerService } from "@promptweave/io";
import { MemoryFactory } from "@promptweave/memory";
import type { VectorStore } from "@promptweave/types";
import type { Chain } from "./chain";
import {
  ConversationalChain,
  type ConversationalChainOptions,
} from "./conversational.chain";
import {
  ConversationalRetrievalChain,
  type ConversationalRetrievalChainOptions,
} from "./conversational-retrieval.chain";
import { LLMChain, type LLMChainOptions } from "./llm.chain";
import { SequentialChain, type SequentialChainOptions } from "./sequential.chain";
import {
  StuffDocumentsChain,
  type StuffDocumentsChainOptions,
} from "./stuff-documents.chain";
import { VectorStoreRetriever } from "./vector-store.retriever";

/**
 * Builds chains with defaults taken from the active configuration snapshot
 * and loggers scoped per chain type.
 */
@Injectable()
export class ChainFactory {
  constructor(
    @Inject(LoggerService) private readonly loggerService: LoggerService,
    @Inject(MemoryFactory) private readonly memoryFactory: MemoryFactory,
    @Optional()
    @Inject(ConfigStore)
    private readonly configStore: ConfigStore = new ConfigStore()
  ) {}

  createLLMChain(options: LLMChainOptions): LLMChain {
    const { chain } = this.configStore.getSnapshot();
    return new LLMChain({
      ...options,
      outputKey: options.outputKey ?? chain.outputKey,
      callOptions: { ...chain.callOptions, ...options.callOptions },
      logger: options.logger ?? this.logger("llm-chain"),
    });
  }

  /** Uses a window memory sized from configuration unless one is given. */
  createConversationalChain(options: ConversationalChainOptions): ConversationalChain {
    const { chain } = this.configStore.getSnapshot();
    return new ConversationalChain({
      ...options,
      memory: options.memory ?? this.memoryFactory.create("window"),
      outputKey: options.outputKey ?? chain.outputKey,
      callOptions: { ...chain.callOptions, ...options.callOptions },
      logger: options.logger ?? this.logger("conversational-chain"),
    });
  }

  createSequentialChain(
    chains: readonly Chain[],
    options: SequentialChainOptions = {}
  ): SequentialChain {
    return new SequentialChain(chains, {
      ...options,
      logger: options.logger ?? this.logger("sequential-chain"),
    });
  }

  createStuffDocumentsChain(options: StuffDocumentsChainOptions): StuffDocumentsChain {
    return new StuffDocumentsChain({
      ...options,
      logger: options.logger ?? this.logger("stuff-documents-chain"),
    });
  }

  createConversationalRetrievalChain(
    options: ConversationalRetrievalChainOptions
  ): ConversationalRetrievalChain {
    const { chain } = this.configStore.getSnapshot();
    return new ConversationalRetrievalChain({
      ...options,
      memory: options.memory ?? this.memoryFactory.create("window"),
      outputKey: options.outputKey ?? chain.outputKey,
      logger: options.logger ?? this.logger("conversational-retrieval-chain"),
    });
  }

  /** `k` defaults to `retrieval.topK`. */
  createRetriever(store: VectorStore, k?: number): VectorStoreRetriever {
    return new VectorStoreRetriever(store, k ?? this.configStore.getSnapshot().retrieval.topK);
  }

  private logger(scope: string): Logger {
    return this.loggerService.getLogger(scope);
  }
}
