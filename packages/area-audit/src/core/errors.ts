/**
 * Area Audit Error Types
 *
 * Fatal errors only. Malformed input is reported as ValidationError values;
 * the classes below signal programming defects or misconfiguration and must
 * abort the request that hit them.
 */

/**
 * Thrown when a lint rule's evaluate() or autofix() throws.
 *
 * A faulted rule is a defect, not a "no issue" result. LintCache never stores
 * a result produced while this error was raised.
 *
 * @example
 * ```typescript
 * try {
 *   await cache.getOrCompute(area.id, area);
 * } catch (error) {
 *   if (isLintRuleFaultError(error)) {
 *     logger.error(error.toLogString());
 *   }
 *   throw error;
 * }
 * ```
 */
export class LintRuleFaultError extends Error {
  public readonly name = 'LintRuleFaultError' as const;

  constructor(
    message: string,
    public readonly ruleId: string,
    public readonly areaId: string,
    public readonly cause?: unknown
  ) {
    super(message);
    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, LintRuleFaultError.prototype);
  }

  /**
   * Create a formatted error message for logging
   */
  toLogString(): string {
    const parts = [
      `LintRuleFaultError: ${this.message}`,
      `  Rule: ${this.ruleId}`,
      `  Area: ${this.areaId}`,
    ];
    if (this.cause instanceof Error) {
      parts.push(`  Cause: ${this.cause.message}`);
    }
    return parts.join('\n');
  }
}

/**
 * Type guard to check if an error is a LintRuleFaultError
 */
export function isLintRuleFaultError(error: unknown): error is LintRuleFaultError {
  return error instanceof LintRuleFaultError;
}

/**
 * Thrown when an autofix is requested for a rule that has none
 */
export class AutofixUnavailableError extends Error {
  public readonly name = 'AutofixUnavailableError' as const;

  constructor(public readonly ruleId: string) {
    super(`Rule "${ruleId}" is unknown or has no autofix`);
    Object.setPrototypeOf(this, AutofixUnavailableError.prototype);
  }
}

/**
 * Thrown when configuration values fail validation
 */
export class ConfigError extends Error {
  public readonly name = 'ConfigError' as const;

  constructor(
    message: string,
    public readonly issues: readonly string[] = []
  ) {
    super(message);
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError;
}
