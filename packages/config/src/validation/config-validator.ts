import { Injectable } from "@nestjs/common";
import type { z } from "zod";
import { PROMPTWEAVE_CONFIG_SCHEMA } from "../schema";
import type { PromptweaveConfig } from "../types";

export interface ConfigIssue {
  path: string;
  message: string;
}

export class ConfigValidationError extends Error {
  readonly summary: string;

  constructor(summary: string, readonly issues: ConfigIssue[]) {
    super(
      issues.length > 0
        ? `${summary}:\n${issues.map((issue) => `- ${issue.path}: ${issue.message}`).join("\n")}`
        : summary
    );
    this.name = "ConfigValidationError";
    this.summary = summary;
  }
}

export const toIssues = (issues: z.ZodError["issues"]): ConfigIssue[] =>
  issues.map((issue) => ({
    path: issue.path.length > 0 ? issue.path.map(String).join(".") : "(root)",
    message: issue.message,
  }));

@Injectable()
export class ConfigValidator {
  validate(candidate: unknown): PromptweaveConfig {
    const result = PROMPTWEAVE_CONFIG_SCHEMA.safeParse(candidate);
    if (!result.success) {
      throw new ConfigValidationError(
        "Configuration is invalid",
        toIssues(result.error.issues)
      );
    }
    return result.data;
  }
}
