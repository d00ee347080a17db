/**
 * Thrown before any computation when an input is outside its documented range.
 */
export class SpaInputError extends Error {
  readonly field: string;
  readonly received: unknown;
  readonly expected: string;

  constructor(field: string, received: unknown, expected: string) {
    super(`Invalid SPA input "${field}": received ${String(received)}, expected ${expected}`);
    this.name = "SpaInputError";
    this.field = field;
    this.received = received;
    this.expected = expected;
  }
}
