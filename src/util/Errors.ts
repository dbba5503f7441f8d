export type ErrorKind = 'ConfigurationError' | 'AuthenticationError' | 'CheckinAmbiguousError' | 'TransientIOError'

export type AuthFailureReason = 'bad-credentials' | 'timeout' | 'human-intervention-required'

export abstract class CheckinError extends Error {
    abstract readonly kind: ErrorKind

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options)
        this.name = new.target.name
    }
}

/** Account cannot be processed as configured. Fatal for that account only. */
export class ConfigurationError extends CheckinError {
    readonly kind = 'ConfigurationError' as const
}

export class AuthenticationError extends CheckinError {
    readonly kind = 'AuthenticationError' as const

    constructor(
        public readonly reason: AuthFailureReason,
        message: string
    ) {
        super(`${message} (${reason})`)
    }
}

/** The check-in action ran but its outcome could not be read back */
export class CheckinAmbiguousError extends CheckinError {
    readonly kind = 'CheckinAmbiguousError' as const
}

/** Any driver or API failure */
export class TransientIOError extends CheckinError {
    readonly kind = 'TransientIOError' as const
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) return error.message
    return String(error)
}

export function toCheckinError(error: unknown): CheckinError {
    if (error instanceof CheckinError) return error
    return new TransientIOError(errorMessage(error), { cause: error })
}
