/**
 * Returns a string message from an unknown caught value.
 * Use in catch (error: unknown) blocks instead of error?.message.
 */
export function getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Reads an HTTP status off a provider error (`status` or `response.status`), if any.
 */
export function getErrorStatus(error: unknown): number | undefined {
    if (typeof error !== 'object' || error === null) return undefined;

    if ('status' in error && typeof error.status === 'number') {
        return error.status;
    }
    if ('response' in error && typeof error.response === 'object' && error.response !== null
        && 'status' in error.response && typeof error.response.status === 'number') {
        return error.response.status;
    }
    return undefined;
}
