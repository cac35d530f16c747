export class IllegalStateError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "IllegalStateError";
    }
}

export class UnrecognizedSpecVersionError extends Error {
    constructor(public readonly specVersion: string) {
        super(`Unrecognized spec version: ${specVersion}`);
        this.name = "UnrecognizedSpecVersionError";
    }
}

export class UnsupportedExtensionTypeError extends Error {
    constructor(public readonly extensionName: string, value: unknown) {
        super(`Illegal value inside extensions map: ${extensionName}=${describeValue(value)}`);
        this.name = "UnsupportedExtensionTypeError";
    }
}

export class UnsupportedAttributeError extends Error {
    constructor(public readonly attributeName: string, specVersion: string) {
        super(`Attribute "${attributeName}" is not supported by spec version ${specVersion}`);
        this.name = "UnsupportedAttributeError";
    }
}

export class InvalidAttributeError extends Error {
    constructor(public readonly attributeName: string, reason: string) {
        super(`Invalid attribute "${attributeName}": ${reason}`);
        this.name = "InvalidAttributeError";
    }
}

export class MissingDataError extends Error {
    constructor(message = "data must not be null") {
        super(message);
        this.name = "MissingDataError";
    }
}

export class SerializationError extends Error {
    constructor(message: string, public readonly originalError?: Error) {
        super(message);
        this.name = "SerializationError";
    }
}

export class DeserializationError extends Error {
    constructor(message: string, public readonly originalError?: Error) {
        super(message);
        this.name = "DeserializationError";
    }
}

export class MessageVisitError extends Error {
    constructor(message: string, public readonly originalError: Error) {
        super(`${message}: ${originalError.message}`);
        this.name = "MessageVisitError";
    }
}

export class MessageProcessingError extends Error {
    constructor(message: string, public readonly originalError: Error) {
        super(message);
        this.name = "MessageProcessingError";
    }
}

export function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
}

function describeValue(value: unknown): string {
    if (value === null) return "null";
    if (typeof value === "object") return `[${value.constructor?.name ?? "object"}]`;
    return `${String(value)} (${typeof value})`;
}
