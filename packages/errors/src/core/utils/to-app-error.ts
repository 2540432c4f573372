import type { AppError, ErrorCode } from "../../ports/error"
import { BaseError } from "../base-error"

function errnoOf(err: Error): string | undefined {
  return "code" in err && typeof err.code === "string" ? err.code : undefined
}

/**
 * Normalizes a thrown value into an AppError.
 *
 * A BaseError is returned as is. A Node system error (one carrying an errno
 * code such as `EACCES`) becomes an operational `system_error`. Anything
 * else is wrapped as non-operational under `fallbackCode`.
 */
export function toAppError(err: unknown, fallbackCode: ErrorCode = "unknown"): AppError {
  if (err instanceof BaseError) return err

  if (err instanceof Error) {
    const errno = errnoOf(err)

    if (errno !== undefined) {
      return new BaseError(err.message, {
        code: "system_error",
        context: { errno },
        cause: err,
      })
    }

    return new BaseError(err.message, { code: fallbackCode, cause: err, isOperational: false })
  }

  return new BaseError(typeof err === "string" ? err : "Unknown error", {
    code: fallbackCode,
    context: typeof err === "string" ? {} : { value: err },
    isOperational: false,
  })
}
