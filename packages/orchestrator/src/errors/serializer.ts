import BaseError from "./baseError";

export interface SerializedError {
  errorClass: string;
  message?: string;
  cause?: SerializedError;
}

export function serialize(err: Error): SerializedError {
  const serializedObject: SerializedError = {
    errorClass: err.constructor.name,
  };

  if (err.message) serializedObject.message = err.message;

  if (err instanceof BaseError && err.cause) {
    serializedObject.cause = serialize(err.cause);
  }

  return serializedObject;
}
