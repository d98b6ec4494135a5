// CHANGE: Pure rewriting of one template file (markers in, suppressions in)
// WHY: SHELL only reads and writes files; every decision about which line changes lives here
// PURITY: CORE
// INVARIANT: Output keeps every original line in order; only whole lines are added
// COMPLEXITY: O(n · d) where n = |lines|, d = distance to the nearest block scalar opener

import {
	findIndentation,
	isDeclaration,
} from "../classify/line-classifier.js";
import { formatMarker, formatSuppression } from "./markers.js";

/**
 * A declaration found while instrumenting one file, before it is attached to a path.
 */
export interface LineDeclaration {
	readonly token: string;
	readonly line: number;
	readonly source: string;
}

export interface InstrumentedFile {
	readonly content: string;
	readonly declarations: readonly LineDeclaration[];
}

/**
 * Inserts a marker after every traced declaration of a file.
 *
 * CHANGE: Rebuild content from the line list instead of patching offsets
 * WHY: Each insertion only extends the element of its own declaration, so several markers per file
 *      never shift one another and line numbers keep referring to the original file
 *
 * @param content - Full file content
 * @param nextToken - Generator of globally unique tokens
 * @returns New content plus one declaration per inserted marker
 *
 * @pure true when nextToken is deterministic
 * @invariant declarations.length = |{ i | isDeclaration(lines, i) }|
 *
 * @example
 * ```ts
 * instrumentContent("{{ if .Values.a }}\nx: 1\n{{ end }}", () => "t1").content;
 * // "{{ if .Values.a }}\n# branchtrace: t1\nx: 1\n{{ end }}"
 * ```
 */
export function instrumentContent(
	content: string,
	nextToken: () => string,
): InstrumentedFile {
	const lines = content.split("\n");
	const rewritten: string[] = [];
	const declarations: LineDeclaration[] = [];

	lines.forEach((line, index) => {
		if (!isDeclaration(lines, index)) {
			rewritten.push(line);
			return;
		}
		const token = nextToken();
		declarations.push({ token, line: index, source: line.trim() });
		rewritten.push(
			`${line}\n${formatMarker(findIndentation(lines, index), token)}`,
		);
	});

	return { content: rewritten.join("\n"), declarations };
}

/**
 * Writes a suppression annotation above each of the given declaration lines.
 *
 * CHANGE: Insert from the bottom of the file upwards
 * WHY: Inserting a line shifts everything below it; going bottom-up keeps the remaining
 *      line numbers (and the lines indentation is resolved from) untouched
 *
 * @param content - Current content of the original template
 * @param lineNumbers - Zero-based declaration lines, in any order; duplicates collapse
 *
 * @pure true
 * @postcondition every listed declaration is preceded by `# branchtrace:ignore` at marker indentation
 */
export function suppressContent(
	content: string,
	lineNumbers: readonly number[],
): string {
	const lines = content.split("\n");
	const descending = [...new Set(lineNumbers)].sort((a, b) => b - a);

	for (const line of descending) {
		if (line < 0 || line >= lines.length) {
			continue;
		}
		lines.splice(line, 0, formatSuppression(findIndentation(lines, line)));
	}

	return lines.join("\n");
}
