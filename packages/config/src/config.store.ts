import { Inject, Injectable, Optional } from "@nestjs/common";
import { BehaviorSubject, type Observable, distinctUntilChanged } from "rxjs";
import { isDeepStrictEqual } from "util";
import { DEFAULT_CONFIG } from "./defaults";
import { INITIAL_CONFIG_TOKEN } from "./config.const";
import type { PromptweaveConfig } from "./types";

@Injectable()
export class ConfigStore {
  private readonly subject: BehaviorSubject<PromptweaveConfig>;

  readonly changes$: Observable<PromptweaveConfig>;

  constructor(
    @Optional()
    @Inject(INITIAL_CONFIG_TOKEN)
    initialConfig?: PromptweaveConfig,
  ) {
    this.subject = new BehaviorSubject<PromptweaveConfig>(
      structuredClone(initialConfig ?? DEFAULT_CONFIG),
    );
    this.changes$ = this.subject
      .asObservable()
      .pipe(distinctUntilChanged((previous, next) => isDeepStrictEqual(previous, next)));
  }

  setSnapshot(snapshot: PromptweaveConfig): void {
    this.subject.next(structuredClone(snapshot));
  }

  getSnapshot(): PromptweaveConfig {
    return structuredClone(this.subject.getValue());
  }
}
