/**
 * Raised when engine state breaks a structural rule (e.g. a locked block
 * written over an occupied cell). Ordinary gameplay outcomes never throw.
 */
export class InvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvariantError";
  }
}

export function invariant(
  condition: boolean,
  message: string,
): asserts condition {
  if (!condition) throw new InvariantError(message);
}
