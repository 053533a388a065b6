export class SnaptrailError extends Error {
    constructor(message: string, public readonly originalError?: unknown) {
        super(message);
        this.name = 'SnaptrailError';
    }
}

/** Write attempted on a store that has been disposed. */
export class InvalidError extends SnaptrailError {
    constructor(message: string = 'undefined metrics') {
        super(message);
        this.name = 'InvalidError';
    }
}

export class NotNumberError extends SnaptrailError {
    constructor(message: string = 'not a number') {
        super(message);
        this.name = 'NotNumberError';
    }
}

export class NotFoundError extends SnaptrailError {
    constructor(message: string = 'not found') {
        super(message);
        this.name = 'NotFoundError';
    }
}

/**
 * Raised by extractNumbers when a requested key cannot be resolved.
 * `index` is set when the failure happened while walking the timeline.
 */
export class ExtractError extends SnaptrailError {
    constructor(
        message: string,
        public readonly key: string,
        public readonly when: number,
        public readonly index: number | null,
        originalError: NotNumberError | NotFoundError
    ) {
        super(message, originalError);
        this.name = 'ExtractError';
    }
}

export class IntegrityError extends SnaptrailError {
    constructor(message: string, originalError?: unknown) {
        super(message, originalError);
        this.name = 'IntegrityError';
    }
}

export class IncompleteDataError extends SnaptrailError {
    constructor(message: string) {
        super(message);
        this.name = 'IncompleteDataError';
    }
}

export class LimitExceededError extends SnaptrailError {
    constructor(message: string) {
        super(message);
        this.name = 'LimitExceededError';
    }
}
