// ---------------------------------------------------------------------------
// Route patterns: literal, named (`:id`) and wildcard (`*rest`) segments
// ---------------------------------------------------------------------------

import { Err, Ok, type Result, RoutePatternError } from "@switchyard/core";
import { normalizePath, splitPath } from "./path";

/** A single parsed pattern segment. */
export type Segment =
	| { readonly kind: "literal"; readonly value: string }
	| { readonly kind: "named"; readonly name: string }
	| { readonly kind: "wildcard"; readonly name: string };

/** A parsed, validated route pattern. */
export interface PathPattern {
	/** The pattern in normalized form, e.g. `/users/:id`. */
	readonly source: string;
	readonly segments: readonly Segment[];
}

const CAPTURE_NAME_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;

function parseSegment(raw: string): Segment {
	if (raw.startsWith(":")) return { kind: "named", name: raw.slice(1) };
	if (raw.startsWith("*")) return { kind: "wildcard", name: raw.length > 1 ? raw.slice(1) : "*" };
	return { kind: "literal", value: raw };
}

/**
 * Parse a route pattern.
 *
 * Fails when a capture name is empty or not an identifier, when the same
 * name is captured twice, or when a wildcard is not the final segment.
 */
export function parsePattern(pattern: string): Result<PathPattern, RoutePatternError> {
	const source = normalizePath(pattern);
	const segments = splitPath(source).map(parseSegment);
	const seen = new Set<string>();

	for (const [index, segment] of segments.entries()) {
		if (segment.kind === "literal") continue;

		if (segment.kind === "wildcard" && index !== segments.length - 1) {
			return Err(
				new RoutePatternError(`Wildcard *${segment.name} must be the last segment in ${source}`),
			);
		}
		if (segment.kind === "named" && !CAPTURE_NAME_RE.test(segment.name)) {
			return Err(new RoutePatternError(`Invalid capture name ":${segment.name}" in ${source}`));
		}
		if (segment.kind === "wildcard" && segment.name !== "*" && !CAPTURE_NAME_RE.test(segment.name)) {
			return Err(new RoutePatternError(`Invalid wildcard name "*${segment.name}" in ${source}`));
		}
		if (seen.has(segment.name)) {
			return Err(new RoutePatternError(`Capture "${segment.name}" appears twice in ${source}`));
		}
		seen.add(segment.name);
	}

	return Ok({ source, segments });
}
