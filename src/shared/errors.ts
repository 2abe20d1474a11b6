/**
 * Error types for better classification
 */

/**
 * A precondition the host relies on was violated (e.g. attaching twice)
 */
export class InvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvariantError';
  }
}

/**
 * A queued bridge call could not be delivered
 */
export class BridgeError extends Error {
  constructor(
    message: string,
    public readonly module: string,
    public readonly method: string
  ) {
    super(message);
    this.name = 'BridgeError';
  }
}

/**
 * A simulation scenario file is malformed
 */
export class ScenarioError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ScenarioError';
  }
}

/**
 * Normalize anything thrown into an Error
 */
export function toError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e));
}
