/**
 * Error Types
 *
 * Missing or malformed claim data is never an error. These classes cover
 * precondition violations: input the pipeline cannot process at all.
 */

/**
 * Raised when extraction or routing is handed something other than a
 * document string or a claim record.
 */
export class InvalidClaimInputError extends Error {
  readonly received: string;

  constructor(message: string, received: unknown) {
    super(message);
    this.name = 'InvalidClaimInputError';
    this.received = received === null ? 'null' : typeof received;
  }
}
