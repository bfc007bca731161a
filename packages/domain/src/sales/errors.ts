/**
 * Raised by an aggregate method when an argument is out of range (negative
 * price, quantity above the cap). Distinct from request validation, which
 * happens before the aggregate is loaded.
 */
export class ArgumentError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ArgumentError'
  }
}

/**
 * Raised when an operation conflicts with the aggregate's current state,
 * e.g. mutating a cancelled sale or exceeding the per-product cap.
 * Messages are fixed literals from SALE_MESSAGES.
 */
export class InvalidStateError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'InvalidStateError'
  }
}
