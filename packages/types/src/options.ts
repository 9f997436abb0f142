import type { ModelCallOptions, StreamSink } from "./model";

/**
 * Options recognised on a single chain or agent invocation. Anything else
 * a caller passes is dropped rather than rejected.
 */
export type InvocationOptions = ModelCallOptions & {
  streamingSink?: StreamSink;
  maxIterations?: number;
  timeoutMs?: number;
};

export type InvocationOptionsInput = InvocationOptions & {
  readonly [key: string]: unknown;
};
