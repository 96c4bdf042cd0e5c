// new BaseError( message );
// new BaseError( cause, message );
export default class BaseError extends Error {
  declare cause?: Error;

  constructor(...args: [message?: string] | [cause: Error, message?: string]) {
    super();
    Error.captureStackTrace(this, this.constructor);

    const [first, second] = args;
    const cause = first instanceof Error ? first : undefined;
    const message = first instanceof Error ? second : first;

    this.name = new.target.name;
    if (cause) this.cause = cause;

    this.message = message || this.name;
    if (this.cause?.message) this.message += "; caused by " + this.cause.message;
  }

  fullStack(): string {
    let stackTraceString = this.stack || "";

    if (this.cause) {
      stackTraceString += "\ncaused by: ";
      if (this.cause instanceof BaseError) {
        stackTraceString += this.cause.fullStack();
      } else {
        stackTraceString += this.cause.stack || "";
      }
    }

    return stackTraceString;
  }
}
