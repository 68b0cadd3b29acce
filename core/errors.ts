import type { ZodIssue } from "zod";

export class ConfigValidationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid simulation config: ${issues.join("; ")}`);
    this.name = "ConfigValidationError";
    this.issues = issues;
  }

  static fromZodIssues(issues: ZodIssue[]): ConfigValidationError {
    return new ConfigValidationError(
      issues.map((issue) => {
        const path = issue.path.length > 0 ? issue.path.join(".") : "config";
        return `${path}: ${issue.message}`;
      })
    );
  }
}

/** Raised when the engine reaches a state its own logic should rule out. */
export class InvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvariantError";
  }
}
