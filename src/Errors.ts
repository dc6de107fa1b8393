import { ErrorKind, Failure } from './types';

export class FeedError extends Error {
    readonly kind: ErrorKind;
    readonly status?: number;

    constructor(kind: ErrorKind, message: string, status?: number) {
        super(message);
        this.name = 'FeedError';
        this.kind = kind;
        this.status = status;
    }

    toFailure(): Failure {
        return this.status === undefined
            ? { kind: this.kind, message: this.message }
            : { kind: this.kind, message: this.message, status: this.status };
    }
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

// Anything that is not already a FeedError becomes the given fallback kind
export function toFailure(error: unknown, fallback: ErrorKind): Failure {
    if (error instanceof FeedError) {
        return error.toFailure();
    }
    return { kind: fallback, message: describeError(error) };
}
