export interface Document {
  readonly pageContent: string;
  readonly metadata: Readonly<Record<string, unknown>>;
  readonly score?: number;
}

export interface RetrievalOptions {
  signal?: AbortSignal;
}

export interface Retriever {
  getRelevantDocuments(
    query: string,
    options?: RetrievalOptions
  ): Promise<Document[]>;
}

export interface VectorStore {
  addDocuments(documents: readonly Document[]): Promise<void>;
  similaritySearch(query: string, k: number): Promise<Document[]>;
}

export const createDocument = (
  pageContent: string,
  metadata: Record<string, unknown> = {}
): Document => ({ pageContent, metadata });

export function isDocument(value: unknown): value is Document {
  return (
    typeof value === "object" &&
    value !== null &&
    "pageContent" in value &&
    typeof value.pageContent === "string" &&
    "metadata" in value &&
    typeof value.metadata === "object" &&
    value.metadata !== null
  );
}

export function isDocumentList(value: unknown): value is readonly Document[] {
  return Array.isArray(value) && value.every(isDocument);
}
