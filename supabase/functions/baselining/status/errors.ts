/** Caller supplied something the engine cannot classify (bad policy, non-finite value, bad window). */
export class StatusInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "StatusInputError";
  }
}

/** The observation store could not answer (unreachable, query error, timeout, malformed row). */
export class ObservationStoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ObservationStoreError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : "unknown_error";
}
