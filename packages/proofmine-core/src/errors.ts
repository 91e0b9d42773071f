/**
 * Error types that stop a whole run, plus the isolation failure that is
 * downgraded to a per-file `error` record.
 */

/**
 * Thrown when a configuration file or flag cannot be used.
 */
export class ConfigError extends Error {
    readonly name = 'ConfigError';
    readonly issues: string[];

    constructor(message: string, issues: string[] = []) {
        super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
        this.issues = issues;
        Object.setPrototypeOf(this, ConfigError.prototype);
    }
}

/**
 * Thrown by the preflight check when the verifier executable does not resolve.
 */
export class VerifierNotFoundError extends Error {
    readonly name = 'VerifierNotFoundError';
    readonly command: string;

    constructor(command: string) {
        super(`Verifier executable not found: ${command}`);
        this.command = command;
        Object.setPrototypeOf(this, VerifierNotFoundError.prototype);
    }
}

export class IsolationError extends Error {
    readonly name = 'IsolationError';

    constructor(message: string, cause: unknown) {
        super(`Failed to isolate snippet: ${message}`, { cause });
        Object.setPrototypeOf(this, IsolationError.prototype);
    }
}

/**
 * Thrown when a manifest line is not valid JSON or does not match the record shape.
 */
export class ManifestParseError extends Error {
    readonly name = 'ManifestParseError';
    readonly filePath: string;
    readonly line: number;

    constructor(filePath: string, line: number, reason: string) {
        super(`Invalid manifest entry at ${filePath}:${line}: ${reason}`);
        this.filePath = filePath;
        this.line = line;
        Object.setPrototypeOf(this, ManifestParseError.prototype);
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
