/** Error when a handle names a table the store does not hold. */
export class TableNotFoundError extends Error {
  constructor(public readonly data: string) {
    super(`Table not found: ${data}`)
    this.name = 'TableNotFoundError'
  }
}

/** Error when a table cannot be built, encoded or decoded. */
export class TableCodecError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'TableCodecError'
  }
}
