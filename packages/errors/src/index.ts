export type {
  AppError,
  ErrorCode,
  ErrorContext,
  SerializedError,
} from "./ports/app-error"
export { BaseError, type BaseErrorOptions } from "./core/base-error"
export { errorChain, rootCause } from "./core/error-chain"
export { isAppError } from "./core/is-app-error"
export { serializeError, type SerializeOptions } from "./core/serialize-error"
export { toAppError } from "./core/to-app-error"
