const NETWORK_ERROR_CODES = new Set([
    'ECONNREFUSED',
    'ECONNRESET',
    'ENOTFOUND',
    'EAI_AGAIN',
    'ETIMEDOUT',
    'EPIPE',
    'EHOSTUNREACH',
]);

const CREDENTIAL_ERROR_NAMES = new Set([
    'CredentialsProviderError',
    'CredentialsError',
    'ExpiredTokenException',
    'UnrecognizedClientException',
    'InvalidAccessKeyId',
    'SignatureDoesNotMatch',
]);

function errorCode(err: unknown): string | undefined {
    if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
        return err.code;
    }
    return undefined;
}

/** Credential resolution or signing failures surfaced by the AWS SDK. */
export function isCredentialsError(err: unknown): boolean {
    return err instanceof Error && CREDENTIAL_ERROR_NAMES.has(err.name);
}

/** Timeouts and socket-level failures, i.e. the service could not be reached. */
export function isNetworkError(err: unknown): boolean {
    if (!(err instanceof Error)) return false;
    if (err.name === 'TimeoutError' || err.name === 'AbortError') return true;

    const code = errorCode(err);
    return code !== undefined && NETWORK_ERROR_CODES.has(code);
}
