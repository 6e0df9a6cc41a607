/**
 * pipeable/errors entry point
 *
 * Error types raised by pipes.
 */
export {
  // Error types
  PipeFailure,
  InvalidOperatorError,
  // Type guards
  isPipeFailure,
  isInvalidOperatorError,
  // Helpers
  describeThrown,
} from "./errors";

export { wrapFailure } from "./failable";
