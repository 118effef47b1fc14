/**
 * Base class for errors raised by the review engine.
 */
export class ReviewError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ReviewError';
    }
}

/**
 * Configuration problem that makes running a pass pointless.
 */
export class ConfigurationError extends ReviewError {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigurationError';
    }
}

/**
 * The primary detection source has no credential. Aborts the pass before any network call.
 */
export class MissingCredentialError extends ConfigurationError {
    constructor(public readonly credential: string) {
        super(`${credential} is required to run a domain review`);
        this.name = 'MissingCredentialError';
    }
}

/**
 * A bounded operation ran past its deadline.
 */
export class TimeoutError extends ReviewError {
    constructor(public readonly timeoutMs: number) {
        super(`Operation timed out after ${timeoutMs}ms`);
        this.name = 'TimeoutError';
    }
}

export class CancelledError extends ReviewError {
    constructor(message: string = 'Operation cancelled') {
        super(message);
        this.name = 'CancelledError';
    }
}

/**
 * A page did not contain a field the workflow depends on.
 */
export class UnexpectedPageStructureError extends ReviewError {
    constructor(public readonly missing: string) {
        super(`unexpected page structure (missing ${missing})`);
        this.name = 'UnexpectedPageStructureError';
    }
}

/**
 * The source answered with a challenge meant for humans (CAPTCHA redirect, bot wall).
 */
export class AntiBotChallengeError extends ReviewError {
    constructor(detail: string) {
        super(`anti-bot challenge: ${detail}`);
        this.name = 'AntiBotChallengeError';
    }
}
