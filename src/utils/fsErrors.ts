/**
 * True for the error fs raises when a path does not exist
 */
export function isNotFound(err: unknown): boolean {
    return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
