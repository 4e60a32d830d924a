/**
 * Raised when the report engine's own bookkeeping breaks: an unbalanced
 * context stack, a strike without a matching setup, or a block used outside
 * the assertion it belongs to. A failing assertion is never an EngineError.
 */
export class EngineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "EngineError";
  }
}

export function isEngineError(err: unknown): err is EngineError {
  return err instanceof EngineError;
}
