/**
 * Error taxonomy shared by the gateway components.
 *
 * Every class carries a stable `code` so handlers can turn a failure into a
 * reason-coded status string without inspecting messages.
 */

export type GatewayErrorCode =
  | "empty_pool"
  | "persistence_unavailable"
  | "fetch_error"
  | "invalid_scenario"
  | "duplicate_scenario"
  | "lock_timeout";

export class GatewayError extends Error {
  readonly code: GatewayErrorCode;

  constructor(code: GatewayErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** No scenario ids are available, so no draw is possible. */
export class EmptyPoolError extends GatewayError {
  constructor() {
    super("empty_pool", "No scenarios are available for selection");
  }
}

export class PersistenceUnavailableError extends GatewayError {
  constructor(operation: string, cause?: unknown) {
    super("persistence_unavailable", `Persistence unavailable during ${operation}`, { cause });
  }
}

export class FetchError extends GatewayError {
  constructor(message: string, cause?: unknown) {
    super("fetch_error", message, { cause });
  }
}

export class ScenarioValidationError extends GatewayError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super("invalid_scenario", `Invalid scenario: ${issues.join("; ")}`);
    this.issues = issues;
  }
}

export class DuplicateScenarioError extends GatewayError {
  constructor(szenario: string) {
    super("duplicate_scenario", `Scenario '${szenario}' already exists`);
  }
}

export class LockTimeoutError extends GatewayError {
  constructor(key: string, operation: string) {
    super("lock_timeout", `Lock timeout for ${key} operation ${operation}`);
  }
}

export function isGatewayError(err: unknown): err is GatewayError {
  return err instanceof GatewayError;
}

/** Short description used in status lines; never leaks stack traces. */
export function describeError(err: unknown): string {
  if (isGatewayError(err)) return `${err.code}: ${err.message}`;
  if (err instanceof Error) return err.message;
  return String(err);
}
