/** The model provider could not be reached or rejected the request. */
export class ModelCallError extends Error {
    constructor(message: string, cause?: unknown) {
        super(message, { cause });
        this.name = 'ModelCallError';
    }
}

/** A tool call's arguments are missing or have the wrong type. */
export class SchemaViolationError extends Error {
    constructor(readonly toolName: string, readonly issues: string[]) {
        super(`Invalid arguments for ${toolName}: ${issues.join('; ')}`);
        this.name = 'SchemaViolationError';
    }
}

export class GeocodeError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'GeocodeError';
    }
}

export class SerializationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'SerializationError';
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
