/**
 * @packageDocumentation
 * @module CheckoutErrors
 * @description
 * Typed error taxonomy for merchant interactions.
 *
 * Every failure that reaches a caller is one of four kinds:
 * - **network**: the merchant could not be reached (DNS, connect, timeout).
 * - **http**: the merchant answered with a non-2xx status.
 * - **decode**: the response body did not have the expected shape.
 * - **misuse**: an operation ran on a transport that is not open.
 *
 * Errors are returned inside a {@link Result}, never thrown, so callers
 * can branch on `kind` exhaustively.
 */
export enum CheckoutErrorCode {
    // Network errors (1xxx)
    NETWORK_ERROR = 1001,
    TIMEOUT = 1002,

    // Merchant HTTP errors (2xxx)
    HTTP_CLIENT_ERROR = 2001,
    HTTP_SERVER_ERROR = 2002,

    // Decode errors (3xxx)
    MALFORMED_BODY = 3001,
    UNEXPECTED_SHAPE = 3002,

    // Client misuse (4xxx)
    TRANSPORT_NOT_OPEN = 4001,

    // Configuration (5xxx)
    INVALID_CONFIG = 5001,
}

export type CheckoutErrorKind = 'network' | 'http' | 'decode' | 'misuse';

export abstract class CheckoutError extends Error {
    public abstract readonly kind: CheckoutErrorKind;
    public code: CheckoutErrorCode;
    public remediation: string;
    public retryable: boolean;
    public context?: Record<string, unknown>;

    protected constructor(
        code: CheckoutErrorCode,
        message: string,
        remediation: string,
        retryable: boolean = false,
        context?: Record<string, unknown>
    ) {
        super(message);
        this.name = 'CheckoutError';
        this.code = code;
        this.remediation = remediation;
        this.retryable = retryable;
        this.context = context;

        Object.setPrototypeOf(this, new.target.prototype);
    }

    toJSON() {
        return {
            name: this.name,
            kind: this.kind,
            code: this.code,
            message: this.message,
            remediation: this.remediation,
            retryable: this.retryable,
            context: this.context,
        };
    }
}

export class NetworkError extends CheckoutError {
    public readonly kind = 'network' as const;

    constructor(public cause: Error, context?: Record<string, unknown>) {
        const timedOut = NetworkError.isTimeout(cause);
        super(
            timedOut ? CheckoutErrorCode.TIMEOUT : CheckoutErrorCode.NETWORK_ERROR,
            `Could not connect to merchant: ${cause.message}`,
            timedOut
                ? 'The merchant did not answer within the request timeout. Try again or raise UCP_REQUEST_TIMEOUT_MS.'
                : 'Check the merchant URL and that the merchant server is running.',
            true,
            context
        );
        this.name = 'NetworkError';
    }

    private static isTimeout(cause: Error): boolean {
        const code = 'code' in cause ? cause.code : undefined;
        return code === 'ECONNABORTED' || code === 'ETIMEDOUT';
    }
}

export class ProtocolHTTPError extends CheckoutError {
    public readonly kind = 'http' as const;

    constructor(
        public readonly status: number,
        public readonly body: unknown,
        context?: Record<string, unknown>
    ) {
        super(
            status >= 500 ? CheckoutErrorCode.HTTP_SERVER_ERROR : CheckoutErrorCode.HTTP_CLIENT_ERROR,
            `HTTP error from merchant: ${status} - ${ProtocolHTTPError.renderBody(body)}`,
            status >= 500
                ? 'The merchant failed to process the request. Try again later.'
                : 'The merchant rejected the request. Inspect the response body for the reason.',
            status >= 500 || status === 429,
            context
        );
        this.name = 'ProtocolHTTPError';
    }

    private static renderBody(body: unknown): string {
        return typeof body === 'string' ? body : JSON.stringify(body);
    }
}

export class DecodeError extends CheckoutError {
    public readonly kind = 'decode' as const;

    constructor(public cause: Error, context?: Record<string, unknown>) {
        super(
            cause instanceof SyntaxError ? CheckoutErrorCode.MALFORMED_BODY : CheckoutErrorCode.UNEXPECTED_SHAPE,
            `Unexpected response from merchant: ${cause.message}`,
            'The merchant response does not match the checkout protocol. Confirm the merchant speaks a supported UCP version.',
            false,
            context
        );
        this.name = 'DecodeError';
    }
}

export class ClientMisuseError extends CheckoutError {
    public readonly kind = 'misuse' as const;

    constructor(message: string, context?: Record<string, unknown>) {
        super(
            CheckoutErrorCode.TRANSPORT_NOT_OPEN,
            message,
            'Run the operation inside withTransport(), or call open() before sending.',
            false,
            context
        );
        this.name = 'ClientMisuseError';
    }
}

/**
 * Raised while loading configuration, before any transport exists.
 */
export class ConfigError extends Error {
    public readonly code = CheckoutErrorCode.INVALID_CONFIG;

    constructor(public readonly variable: string, message: string) {
        super(`Invalid configuration for ${variable}: ${message}`);
        this.name = 'ConfigError';
        Object.setPrototypeOf(this, ConfigError.prototype);
    }
}

export type TransportError = NetworkError | ProtocolHTTPError | DecodeError | ClientMisuseError;

