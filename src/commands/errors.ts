/**
 * Base class for every error the command pipeline produces.
 *
 * The dispatcher only ever hands instances of this class to error reporters;
 * anything else thrown along the way is wrapped into one of the subclasses.
 */
export class CommandError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

/** No command (or subcommand) matched the invoked name. */
export class CommandNotFound extends CommandError {
  constructor(readonly invokedWith: string) {
    super(`The command "${invokedWith}" was not found.`)
  }
}

/** A name or alias collided with an existing entry in the same scope. */
export class CommandExistsError extends CommandError {
  constructor(
    readonly conflicting: string,
    readonly existing: string
  ) {
    super(`"${conflicting}" is already registered by the command "${existing}".`)
  }
}

/** The parameter list of a command violates the parameter model. */
export class InvalidParameterError extends CommandError {
  constructor(
    readonly command: string,
    readonly parameter: string,
    reason: string
  ) {
    super(`Invalid parameter "${parameter}" on command "${command}": ${reason}`)
  }
}

/** Malformed input detected while tokenizing, before any conversion runs. */
export class ArgumentParsingFailed extends CommandError {
  constructor(
    message: string,
    readonly position: number
  ) {
    super(`${message} (at position ${position})`)
  }
}

/** A required parameter received neither a value nor a default. */
export class MissingRequiredArgument extends CommandError {
  constructor(readonly parameter: string) {
    super(`"${parameter}" is a required argument that is missing.`)
  }
}

/** A converter rejected a raw value. */
export class BadArgument extends CommandError {
  constructor(
    message: string,
    readonly value?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options)
  }
}

export interface ConversionFailure {
  converter: string
  reason: string
}

/** Every variant of a union converter failed; `failures` keeps each reason in trial order. */
export class ConversionError extends BadArgument {
  constructor(
    readonly parameter: string,
    value: string,
    readonly failures: ConversionFailure[]
  ) {
    const reasons = failures.map((f) => `${f.converter}: ${f.reason}`).join('; ')
    super(`Could not convert "${value}" for "${parameter}" (${reasons})`, value)
  }
}

/** A guard predicate returned false (or threw). */
export class CheckFailure extends CommandError {
  constructor(
    readonly guard: string,
    message?: string,
    options?: { cause?: unknown }
  ) {
    super(message ?? `The guard "${guard}" failed.`, options)
  }
}

/** At least one cooldown denied the attempt. */
export class CommandOnCooldown extends CommandError {
  constructor(
    readonly command: string,
    readonly retryAfterMs: number
  ) {
    super(`Command "${command}" is on cooldown. Try again in ${(retryAfterMs / 1000).toFixed(2)}s`)
  }

  /** Seconds until the attempt would be admitted. */
  get retryAfter(): number {
    return this.retryAfterMs / 1000
  }
}

/** A cooldown's bucket key function threw. The thrown value is kept as `cause`. */
export class CooldownKeyError extends CommandError {
  constructor(
    readonly command: string,
    options: { cause: unknown }
  ) {
    super(`Could not compute the cooldown key for "${command}": ${describeError(options.cause)}`, options)
  }
}

/** Wraps anything thrown by a command body. The original error is kept as `cause`. */
export class CommandInvokeError extends CommandError {
  constructor(readonly original: unknown) {
    super(original instanceof Error ? original.message : String(original), { cause: original })
  }
}

/** A before/after-invoke hook threw. */
export class CommandHookError extends CommandInvokeError {}

/** Returns a readable reason for any thrown value. */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
