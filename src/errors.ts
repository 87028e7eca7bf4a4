export type ToolErrorKind =
    | "InvalidArgument"
    | "UnknownTool"
    | "NotFound"
    | "AuthError"
    | "UpstreamUnavailable"
    | "MalformedUpstreamResponse";

/**
 * Failure that is recoverable at the tool-call boundary. Anything thrown that
 * is not a ToolError is treated as a defect.
 */
export abstract class ToolError extends Error {
    abstract readonly kind: ToolErrorKind;
}

export class InvalidArgumentError extends ToolError {
    readonly kind = "InvalidArgument";

    constructor(readonly parameter: string, readonly reason: string) {
        super(`Invalid argument "${parameter}": ${reason}`);
        this.name = "InvalidArgumentError";
    }
}

export class UnknownToolError extends ToolError {
    readonly kind = "UnknownTool";

    constructor(readonly toolName: string) {
        super(`Unknown tool: ${toolName}`);
        this.name = "UnknownToolError";
    }
}

export class NotFoundError extends ToolError {
    readonly kind = "NotFound";

    constructor(readonly location: string) {
        super(`Location not found: ${location}`);
        this.name = "NotFoundError";
    }
}

export class AuthError extends ToolError {
    readonly kind = "AuthError";

    constructor(message: string) {
        super(`Authentication error: ${message}`);
        this.name = "AuthError";
    }
}

export class UpstreamUnavailableError extends ToolError {
    readonly kind = "UpstreamUnavailable";

    constructor(message: string, readonly status?: number) {
        super(`Weather service unavailable: ${message}`);
        this.name = "UpstreamUnavailableError";
    }
}

export class MalformedResponseError extends ToolError {
    readonly kind = "MalformedUpstreamResponse";

    constructor(detail: string) {
        super(`Unexpected response shape from weather service: ${detail}`);
        this.name = "MalformedResponseError";
    }
}

// thrown at startup only, never from a tool call
export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "ConfigError";
    }
}
