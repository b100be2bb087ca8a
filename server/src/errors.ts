export type VerificationErrorCode = 'ALIGNMENT' | 'CONFIG' | 'DOMAIN' | 'INSUFFICIENT_DATA';

export class VerificationError extends Error {
    readonly code: VerificationErrorCode;

    constructor(code: VerificationErrorCode, message: string) {
        super(message);
        this.name = new.target.name;
        this.code = code;
    }
}

/** Forecast and observation coordinates do not line up. */
export class AlignmentError extends VerificationError {
    constructor(message: string) {
        super('ALIGNMENT', message);
    }
}

export class ConfigError extends VerificationError {
    readonly issues: string[];

    constructor(message: string, issues: string[] = []) {
        super('CONFIG', issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
        this.issues = issues;
    }
}

/** A value lies outside the range its statistic accepts. */
export class DomainError extends VerificationError {
    constructor(message: string) {
        super('DOMAIN', message);
    }
}

export class InsufficientDataError extends VerificationError {
    readonly required: number;
    readonly actual: number;

    constructor(message: string, required: number, actual: number) {
        super('INSUFFICIENT_DATA', `${message} (need ${required}, got ${actual})`);
        this.required = required;
        this.actual = actual;
    }
}

export const isVerificationError = (e: unknown): e is VerificationError => e instanceof VerificationError;
