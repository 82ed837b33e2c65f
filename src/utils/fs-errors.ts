export function errorCode(err: unknown): string | undefined {
	if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
		return err.code;
	}
	return undefined;
}

/** ENOENT, or a path component that is not a directory. */
export function isMissingPathError(err: unknown): boolean {
	const code = errorCode(err);
	return code === 'ENOENT' || code === 'ENOTDIR';
}

export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}
