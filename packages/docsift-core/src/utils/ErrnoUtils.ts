/**
 * True when `error` is a Node system error carrying `code` (ENOENT, EEXIST, ...).
 */
export function hasErrorCode(error: unknown, code: string): boolean {
    return error instanceof Error && 'code' in error && error.code === code;
}
