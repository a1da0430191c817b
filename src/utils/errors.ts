/**
 * Raised while reading configuration. The entry point turns it into exit code 1.
 */
export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

/**
 * A failure before any download work starts: authentication, channel listing,
 * message iteration or an unusable download directory. Fatal to the whole run.
 */
export class SetupError extends Error {
    readonly stage: string;

    constructor(stage: string, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'SetupError';
        this.stage = stage;
    }
}

export function describeError(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    if (typeof error === 'string') {
        return error;
    }
    try {
        return JSON.stringify(error) ?? String(error);
    } catch {
        return String(error);
    }
}
