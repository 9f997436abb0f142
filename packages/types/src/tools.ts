export type JsonSchemaObject = Readonly<Record<string, unknown>>;

export interface ToolContext {
  /** Identifier of the action that requested this call. */
  readonly actionId: string;
  /** Input parsed as a JSON object, or `{ input }` when it is plain text. */
  readonly arguments: Readonly<Record<string, unknown>>;
  readonly signal?: AbortSignal;
}

export interface Tool {
  readonly name: string;
  /** Rendered verbatim into agent prompts. */
  readonly description: string;
  readonly inputSchema?: JsonSchemaObject;
  /** Maximum calls per agent invocation. */
  readonly usageLimit?: number;
  call(input: string, context: ToolContext): Promise<string>;
}
