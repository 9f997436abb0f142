import { Injectable } from "@nestjs/common";
import chalk from "chalk";
import type { StreamSink } from "@promptweave/types";

export interface RenderSinkOptions {
  /** Shown before the first delta and after every newline. */
  label?: string;
  stream?: NodeJS.WritableStream;
}

/** Writes streamed model output to the terminal. */
@Injectable()
export class StreamRendererService {
  createSink(options: RenderSinkOptions = {}): StreamSink {
    const stream = options.stream ?? process.stdout;
    const prefix = options.label ? `${chalk.magenta(`[${options.label}]`)} ` : "";
    let atLineStart = true;

    return {
      write: (delta: string) => {
        if (!delta) {
          return;
        }
        stream.write(this.formatDelta(delta, prefix, atLineStart));
        atLineStart = delta.endsWith("\n");
      },
    };
  }

  private formatDelta(delta: string, prefix: string, atLineStart: boolean): string {
    if (!prefix) {
      return delta;
    }

    const lead = atLineStart ? prefix : "";
    const body = delta.endsWith("\n")
      ? `${delta.slice(0, -1).replace(/\n/g, `\n${prefix}`)}\n`
      : delta.replace(/\n/g, `\n${prefix}`);
    return `${lead}${body}`;
  }
}
