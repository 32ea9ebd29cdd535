/**
 * Configuration error.
 *
 * Every failure raised while locating, parsing, including, tag-processing or
 * validating course configuration is a ConfigError. Validation failures carry
 * the structured issues that produced them.
 */

/**
 * Individual configuration issue.
 */
export interface ConfigIssue {
  /** Dotted path to the offending value, "(root)" for the document itself */
  path: string;
  /** Human-readable message */
  message: string;
  /** Machine-readable code (zod issue code or one of ours) */
  code: string;
  /** Errors abort the load, warnings are reported and kept */
  severity: "error" | "warning";
}

export interface ConfigErrorOptions {
  cause?: unknown;
  issues?: ConfigIssue[];
}

export class ConfigError extends Error {
  public readonly issues: ConfigIssue[];

  constructor(message: string, options: ConfigErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "ConfigError";
    this.issues = options.issues ?? [];
  }

  /**
   * Format the error, its issues and its cause chain for display.
   */
  format(): string {
    const lines = [this.message];
    for (const issue of this.issues) {
      const marker = issue.severity === "warning" ? "warning" : "error";
      lines.push(`  - [${marker}] ${issue.path}: ${issue.message}`);
    }

    let cause: unknown = this.cause;
    while (cause !== undefined) {
      if (cause instanceof Error) {
        lines.push(`  caused by: ${cause.message}`);
        cause = cause.cause;
      } else {
        lines.push(`  caused by: ${String(cause)}`);
        cause = undefined;
      }
    }

    return lines.join("\n");
  }
}

export function isConfigError(value: unknown): value is ConfigError {
  return value instanceof ConfigError;
}
