export class NotFoundError extends Error {
  /** What the user can do about it, e.g. which command lists valid values */
  hint?: string

  constructor(messageOrError: string | Error, hint?: string) {
    super(typeof messageOrError === 'string' ? messageOrError : messageOrError.message)
    if (typeof messageOrError !== 'string' && messageOrError.stack) {
      this.stack = messageOrError.stack
    }
    this.name = 'NotFoundError'
    this.hint = hint
  }
}
