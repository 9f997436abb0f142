import type {
  Document,
  RetrievalOptions,
  Retriever,
  VectorStore,
} from "@promptweave/types";
import { raceAbort } from "../model/cancellation";

export const DEFAULT_TOP_K = 4;

/** Answers queries with the store's `k` nearest documents. */
export class VectorStoreRetriever implements Retriever {
  constructor(
    private readonly store: VectorStore,
    readonly k: number = DEFAULT_TOP_K
  ) {
    if (!Number.isInteger(k) || k <= 0) {
      throw new RangeError(`k must be a positive integer, received ${k}`);
    }
  }

  getRelevantDocuments(query: string, options: RetrievalOptions = {}): Promise<Document[]> {
    return raceAbort(this.store.similaritySearch(query, this.k), options.signal);
  }
}
