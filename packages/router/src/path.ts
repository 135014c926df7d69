/**
 * Bring a request or pattern path into canonical form: a single leading
 * slash, no repeated slashes, and no trailing slash except on the root.
 */
export function normalizePath(path: string): string {
	const collapsed = `/${path}`.replace(/\/{2,}/g, "/");
	if (collapsed.length > 1 && collapsed.endsWith("/")) {
		return collapsed.slice(0, -1);
	}
	return collapsed;
}

/** Split a normalized path into its segments. The root has none. */
export function splitPath(normalized: string): string[] {
	return normalized === "/" ? [] : normalized.slice(1).split("/");
}

/** Join a mount prefix and a sub-route pattern into one normalized path. */
export function joinPaths(prefix: string, path: string): string {
	return normalizePath(`${normalizePath(prefix)}/${path}`);
}

/** Percent-decode a captured value, keeping it raw when it is not valid encoding. */
export function decodeSegment(value: string): string {
	if (!value.includes("%")) return value;
	try {
		return decodeURIComponent(value);
	} catch {
		return value;
	}
}
