// ss2v2ray/src/lib/errors.ts
// Fatal conditions of a conversion run. Anything not listed here is
// reported and tolerated.

export class ConvertError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** Invalid command-line flags, or a start port that leaves no room for the nodes. */
export class ConfigError extends ConvertError {}

/** Input file missing, unreadable, or not a JSON array. */
export class InputError extends ConvertError {
    readonly path: string;

    constructor(path: string, reason: string, options?: ErrorOptions) {
        super(`Input file '${path}' ${reason}`, options);
        this.path = path;
    }
}

/** Output document could not be written. */
export class OutputWriteError extends ConvertError {
    readonly path: string;

    constructor(path: string, options?: ErrorOptions) {
        super(`Error writing output file '${path}': ${describeCause(options?.cause)}`, options);
        this.path = path;
    }
}

export function describeCause(cause: unknown): string {
    if (cause instanceof Error) return cause.message;
    return String(cause);
}
