/**
 * Error taxonomy of the seat probe
 *
 * Every error is fatal for the current run. `code` is stable and safe to
 * match on; `message` is for humans.
 */
export class SeatProbeError extends Error {
    readonly code: string;

    constructor(code: string, message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
        this.code = code;
    }
}

/**
 * The API answered with a non-200 HTTP status, or did not answer at all
 * (status 0)
 */
export class TransportError extends SeatProbeError {
    readonly status: number;
    readonly url: string;

    constructor(status: number, url: string, message = `GET ${url} failed with HTTP ${status}`, options?: ErrorOptions) {
        super('transport_error', message, options);
        this.status = status;
        this.url = url;
    }
}

/**
 * The body was not JSON, the envelope reported failure, or the payload
 * did not have the expected shape
 */
export class ProtocolError extends SeatProbeError {
    constructor(message: string, options?: ErrorOptions) {
        super('protocol_error', message, options);
    }
}

/**
 * Backend data broke an invariant the traversal depends on
 */
export class InvariantError extends SeatProbeError {
    constructor(message: string) {
        super('invariant_violation', message);
    }
}

/**
 * Browser-driven login failed; the browser has already been closed
 */
export class AutomationError extends SeatProbeError {
    constructor(message: string, options?: ErrorOptions) {
        super('automation_error', message, options);
    }
}

export class ConfigError extends SeatProbeError {
    constructor(message: string, options?: ErrorOptions) {
        super('invalid_config', message, options);
    }
}
