import { BaseError, formatErrorChain } from "@hostmon/errors"

export type FileOperation = "stat" | "open" | "read" | "mkdir" | "write" | "close" | "encode"

/**
 * The config file does not exist. Expected on first start; triggers
 * generation of a bootstrap file.
 */
export class ConfigNotFoundError extends BaseError<"config_not_found"> {
  static forPath(path: string, cause?: unknown): ConfigNotFoundError {
    return new ConfigNotFoundError(`config file not found: ${path}`, {
      code: "config_not_found",
      context: { path },
      cause,
    })
  }
}

/**
 * The config file is not a well-formed document, or a value has the wrong type.
 */
export class ConfigDecodeError extends BaseError<"config_decode_error"> {
  static syntax(path: string, cause: unknown): ConfigDecodeError {
    const position = positionOf(cause)
    const detail = cause instanceof Error ? cause.message : String(cause)

    return new ConfigDecodeError(`failed to parse '${path}': ${detail}`, {
      code: "config_decode_error",
      context: { path, ...position },
      cause,
    })
  }

  static invalidValue(key: string, detail: string, cause?: unknown): ConfigDecodeError {
    return new ConfigDecodeError(`invalid value for '${key}': ${detail}`, {
      code: "config_decode_error",
      context: { key },
      cause,
    })
  }

  /** A numeric key holds something other than a number. */
  static numericMismatch(key: string, cause?: unknown): ConfigDecodeError {
    return new ConfigDecodeError(
      `invalid value for '${key}': please use numbers with a decimal point for numerical values`,
      { code: "config_decode_error", context: { key }, cause },
    )
  }

  /** Prefix the message the way the agent reports load failures. */
  withPath(path: string): ConfigDecodeError {
    return new ConfigDecodeError(`Config load error: ${this.message}`, {
      code: "config_decode_error",
      context: { ...this.context, path },
      cause: this.cause,
    })
  }
}

function positionOf(err: unknown): { line?: number; column?: number } {
  if (typeof err !== "object" || err === null) return {}

  return {
    ...("line" in err && typeof err.line === "number" && { line: err.line }),
    ...("column" in err && typeof err.column === "number" && { column: err.column }),
  }
}

/**
 * A semantic rule was violated. `context.key` names the offending key.
 */
export class ConfigValidationError extends BaseError<"config_validation_error"> {
  static forKey(key: string, message: string, cause?: unknown): ConfigValidationError {
    return new ConfigValidationError(message, {
      code: "config_validation_error",
      context: { key },
      cause,
    })
  }
}

/**
 * A filesystem operation on the config file or its directory failed.
 */
export class ConfigIoError extends BaseError<"config_io_error"> {
  static wrap(operation: FileOperation, path: string, cause: unknown): ConfigIoError {
    return new ConfigIoError(`failed to ${operation} '${path}': ${formatErrorChain(cause)}`, {
      code: "config_io_error",
      context: { path, operation },
      cause,
    })
  }

  static alreadyExists(path: string): ConfigIoError {
    return new ConfigIoError(`config file already exists at path: ${path}`, {
      code: "config_io_error",
      context: { path, operation: "open" },
    })
  }
}

export class BandwidthParseError extends BaseError<"bandwidth_parse_error"> {
  static because(input: string, reason: string): BandwidthParseError {
    return new BandwidthParseError(reason, {
      code: "bandwidth_parse_error",
      context: { input },
    })
  }
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err && typeof err.code === "string"
}
