/**
 * Stack trace capture utility
 *
 * Wraps V8's Error.captureStackTrace so error classes can drop their own
 * constructor frames without reaching for `any`.
 *
 * @example
 * ```typescript
 * class MyError extends Error {
 *   constructor(message: string) {
 *     super(message);
 *     this.name = 'MyError';
 *     captureStackTrace(this, MyError);
 *   }
 * }
 * ```
 */

interface V8Error {
  captureStackTrace(targetObject: object, constructorOpt?: Function): void;
}

function hasV8CaptureStackTrace(
  errorConstructor: typeof Error
): errorConstructor is typeof Error & V8Error {
  return 'captureStackTrace' in errorConstructor &&
    typeof errorConstructor.captureStackTrace === 'function';
}

/**
 * Captures a stack trace for the given error object, omitting every frame
 * above and including `constructorOpt`. No-op outside V8.
 */
export function captureStackTrace(
  error: Error,
  constructorOpt?: Function
): void {
  if (hasV8CaptureStackTrace(Error)) {
    Error.captureStackTrace(error, constructorOpt);
  }
}
