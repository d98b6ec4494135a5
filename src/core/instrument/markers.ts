// CHANGE: Marker and suppression comment syntax in one place
// WHY: Injector, scanner and exception writer must agree byte-for-byte on the comment text
// PURITY: CORE
// INVARIANT: MARKER_PREFIX never matches SUPPRESSION_ANNOTATION (the marker prefix ends with a space)
// COMPLEXITY: O(|line|)

import { SUPPRESSION_ANNOTATION } from "../classify/line-classifier.js";

export const MARKER_PREFIX = "# branchtrace: ";

const UUID_TOKEN =
	/^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}/i;

/**
 * @pure true
 * @example formatMarker(2, "abc") === "  # branchtrace: abc"
 */
export function formatMarker(indentation: number, token: string): string {
	return `${" ".repeat(indentation)}${MARKER_PREFIX}${token}`;
}

/**
 * @pure true
 * @example formatSuppression(4) === "    # branchtrace:ignore"
 */
export function formatSuppression(indentation: number): string {
	return `${" ".repeat(indentation)}# ${SUPPRESSION_ANNOTATION}`;
}

/**
 * Extracts the token of a marker line, wherever the marker sits on the line.
 *
 * A left-trimmed action after a declaration renders onto the marker line, so only the
 * UUID after the prefix is taken; other tokens end at the first whitespace.
 *
 * @returns token or null when the line carries no marker
 * @pure true
 * @example parseMarker("# branchtrace: 1b9d6bcd-bbfd-4b2d-9b5d-ab8dfbbd4bed-prod") === "1b9d6bcd-bbfd-4b2d-9b5d-ab8dfbbd4bed"
 */
export function parseMarker(line: string): string | null {
	const at = line.indexOf(MARKER_PREFIX);
	if (at === -1) {
		return null;
	}
	const rest = line.slice(at + MARKER_PREFIX.length).trimStart();
	const uuid = UUID_TOKEN.exec(rest);
	if (uuid !== null) {
		return uuid[0];
	}
	const word = rest.split(/\s/, 1)[0] ?? "";
	return word.length > 0 ? word : null;
}
