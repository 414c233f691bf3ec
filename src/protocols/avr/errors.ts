/**
 * Structured receiver client error taxonomy.
 * @module avr/errors
 */

export type AvrErrorDomain = 'transport' | 'protocol' | 'command' | 'config' | 'timeout';

export type AvrErrorCode =
    | 'CONNECT_TIMEOUT'
    | 'CONNECT_FAILED'
    | 'NOT_CONNECTED'
    | 'WRITE_FAILED'
    | 'PEER_CLOSED'
    | 'STREAM_FRAMING_ERROR'
    | 'TRANSPORT_ERROR'
    | 'INVALID_ARGUMENT'
    | 'CONFIG_INVALID'
    | 'DISCOVERY_INCOMPLETE';

export class AvrError extends Error {
    public readonly domain: AvrErrorDomain;
    public readonly code: AvrErrorCode;
    /** OS-level error code (`ECONNREFUSED`, ...) when the failure came from a socket. */
    public readonly systemCode?: string;
    public readonly details?: Record<string, unknown>;

    constructor(params: {
        message: string;
        domain: AvrErrorDomain;
        code: AvrErrorCode;
        systemCode?: string;
        details?: Record<string, unknown>;
    }) {
        super(params.message);
        this.name = 'AvrError';
        this.domain = params.domain;
        this.code = params.code;
        this.systemCode = params.systemCode;
        this.details = params.details;
    }
}

/** Socket error codes after which a connect attempt is worth repeating. */
export const TRANSIENT_CONNECT_CODES: ReadonlySet<string> = new Set([
    'ECONNREFUSED',
    'ENETUNREACH',
    'EHOSTUNREACH',
    'ECONNRESET',
    'ETIMEDOUT',
    'EAI_AGAIN',
]);

const readSystemCode = (err: unknown): string | undefined => {
    if (err instanceof AvrError) return err.systemCode;
    if (typeof err === 'object' && err !== null && 'code' in err) {
        const {code} = err;
        return typeof code === 'string' ? code : undefined;
    }
    return undefined;
};

export const toAvrError = (
    err: unknown,
    domain: AvrErrorDomain,
    code: AvrErrorCode,
    details?: Record<string, unknown>,
): AvrError => {
    if (err instanceof AvrError) return err;
    const message = err instanceof Error ? err.message : String(err);
    return new AvrError({
        message,
        domain,
        code,
        systemCode: readSystemCode(err),
        details,
    });
};

/** `true` for connect timeouts and the network errors listed in {@link TRANSIENT_CONNECT_CODES}. */
export const isTransientConnectError = (err: unknown): boolean => {
    if (err instanceof AvrError && err.code === 'CONNECT_TIMEOUT') return true;
    const systemCode = readSystemCode(err);
    return systemCode !== undefined && TRANSIENT_CONNECT_CODES.has(systemCode);
};
