/**
 * Implemented by any parser, processor, transport, user store or preference provider
 * that can check its own configuration. Errors thrown by validate are fatal at startup.
 */
export interface Validator {
  validate(signal: AbortSignal): Promise<void>;
}

export function isValidator(value: unknown): value is Validator {
  return (
    typeof value === "object" &&
    value !== null &&
    "validate" in value &&
    typeof value.validate === "function"
  );
}
