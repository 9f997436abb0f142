import type { Logger } from "pino";
import {
  KeyMismatchError,
  type InvocationOptions,
  type OutputVariables,
  type Variables,
} from "@promptweave/types";
import { BaseChain, pickOutputs, type Chain } from "./chain";

export interface SequentialChainOptions {
  /** External inputs; defaults to the first chain's input keys. */
  inputKeys?: readonly string[];
  /** Returned outputs; defaults to the last chain's output keys. */
  outputKeys?: readonly string[];
  logger?: Logger;
}

/**
 * Runs chains in order, feeding each chain's outputs forward as named
 * variables. Key wiring is checked once at construction.
 */
export class SequentialChain extends BaseChain {
  readonly chains: readonly Chain[];
  readonly inputKeys: readonly string[];
  readonly outputKeys: readonly string[];

  constructor(chains: readonly Chain[], options: SequentialChainOptions = {}) {
    super({ logger: options.logger });
    const [first] = chains;
    if (!first) {
      throw new KeyMismatchError("A sequential chain needs at least one chain.");
    }

    this.chains = Object.freeze([...chains]);
    this.inputKeys = Object.freeze([...(options.inputKeys ?? first.inputKeys)]);
    const available = this.validateWiring();

    const last = this.chains[this.chains.length - 1] ?? first;
    const outputKeys = options.outputKeys ?? last.outputKeys;
    const unknown = outputKeys.filter((key) => !available.has(key));
    if (unknown.length > 0) {
      throw new KeyMismatchError(
        `Requested output key(s) ${unknown.join(", ")} are never produced.`,
        unknown
      );
    }
    this.outputKeys = Object.freeze([...outputKeys]);
  }

  protected async call(
    variables: Variables,
    options: InvocationOptions
  ): Promise<OutputVariables> {
    const { streamingSink, ...rest } = options;
    let accumulated: Variables = { ...variables };

    for (const [index, chain] of this.chains.entries()) {
      const isLast = index === this.chains.length - 1;
      this.logger.debug({ index, chain: chain.constructor.name }, "Running chain step");
      const outputs = await chain.invoke(
        accumulated,
        isLast && streamingSink ? { ...rest, streamingSink } : rest
      );
      accumulated = { ...accumulated, ...outputs };
    }

    return pickOutputs(accumulated, this.outputKeys);
  }

  private validateWiring(): Set<string> {
    const available = new Set(this.inputKeys);

    for (const [index, chain] of this.chains.entries()) {
      const missing = chain.inputKeys.filter((key) => !available.has(key));
      if (missing.length > 0) {
        throw new KeyMismatchError(
          `Chain ${index} expects input key(s) ${missing.join(", ")} that no earlier step provides.`,
          missing,
          [],
          index
        );
      }

      const colliding = chain.outputKeys.filter((key) => available.has(key));
      if (colliding.length > 0) {
        throw new KeyMismatchError(
          `Chain ${index} output key(s) ${colliding.join(", ")} would overwrite existing variables.`,
          [],
          colliding,
          index
        );
      }

      chain.outputKeys.forEach((key) => available.add(key));
    }

    return available;
  }
}
