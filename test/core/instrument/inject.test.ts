// CHANGE: Specs for pure marker injection and suppression rewriting
// INVARIANT: |declarations| = |{ i | isDeclaration(lines, i) }|; suppressed branches are never re-registered
// PURITY: CORE

import fc from "fast-check";
import { describe, expect, it } from "vitest";
import { parse } from "yaml";

import { isDeclaration } from "../../../src/core/classify/line-classifier.js";
import {
	instrumentContent,
	suppressContent,
} from "../../../src/core/instrument/inject.js";
import { MARKER_PREFIX } from "../../../src/core/instrument/markers.js";

function counter(): () => string {
	let n = 0;
	return () => {
		n += 1;
		return `t${n}`;
	};
}

// Stands in for helm: directive lines render to nothing when every branch is taken
function renderAll(content: string): string {
	return content
		.split("\n")
		.filter((line) => !line.trimStart().startsWith("{{"))
		.join("\n");
}

function withoutMarkers(value: unknown): unknown {
	if (typeof value === "string") {
		return value
			.split("\n")
			.filter((line) => !line.trimStart().startsWith(MARKER_PREFIX))
			.join("\n");
	}
	if (Array.isArray(value)) {
		return value.map(withoutMarkers);
	}
	if (value !== null && typeof value === "object") {
		return Object.fromEntries(
			Object.entries(value).map(([key, inner]) => [key, withoutMarkers(inner)]),
		);
	}
	return value;
}

describe("instrumentContent", () => {
	it("inserts a marker after each declaration", () => {
		const source = [
			"{{- if .Values.a }}",
			"a: 1",
			"{{- end }}",
			"  {{- if .Values.b }}",
			"  b: 2",
			"  {{- end }}",
		].join("\n");

		const result = instrumentContent(source, counter());

		expect(result.content).toBe(
			[
				"{{- if .Values.a }}",
				"# branchtrace: t1",
				"a: 1",
				"{{- end }}",
				"  {{- if .Values.b }}",
				"  # branchtrace: t2",
				"  b: 2",
				"  {{- end }}",
			].join("\n"),
		);
		expect(result.declarations).toEqual([
			{ token: "t1", line: 0, source: "{{- if .Values.a }}" },
			{ token: "t2", line: 3, source: "{{- if .Values.b }}" },
		]);
	});

	it("indents markers inside a block scalar at body indentation", () => {
		const source = ["data:", "  run.sh: |", "{{- if .Values.debug }}", "    set -x", "{{- end }}"].join("\n");
		const result = instrumentContent(source, counter());
		expect(result.content.split("\n")[3]).toBe("    # branchtrace: t1");
	});

	it("keeps the parsed document of a block scalar unchanged apart from marker lines", () => {
		const source = [
			"apiVersion: v1",
			"kind: ConfigMap",
			"data:",
			"  run.sh: |",
			"{{- if .Values.debug }}",
			"    set -x",
			"{{- end }}",
			"    echo start",
			"  extra: value",
		].join("\n");

		const expected = parse(renderAll(source));
		const rendered = parse(renderAll(instrumentContent(source, counter()).content));

		expect(rendered.data["run.sh"]).toBe("# branchtrace: t1\nset -x\necho start\n");
		expect(withoutMarkers(rendered)).toEqual(expected);
		expect(expected).toEqual({
			apiVersion: "v1",
			kind: "ConfigMap",
			data: { "run.sh": "set -x\necho start\n", extra: "value" },
		});
	});

	it("leaves files without declarations untouched", () => {
		const source = "kind: Service\nmetadata:\n  name: web\n";
		const result = instrumentContent(source, counter());
		expect(result.content).toBe(source);
		expect(result.declarations).toEqual([]);
	});

	it("registers exactly one declaration per classified line", () => {
		const line = fc.constantFrom(
			"{{ if .Values.x }}",
			"  {{- if .Values.y }}",
			"{{ end }}",
			"# branchtrace:ignore",
			"key: value",
			"  script: |",
		);
		fc.assert(
			fc.property(fc.array(line, { maxLength: 30 }), (lines) => {
				const expected = lines.filter((_, i) => isDeclaration(lines, i)).length;
				const result = instrumentContent(lines.join("\n"), counter());
				expect(result.declarations).toHaveLength(expected);
				expect(new Set(result.declarations.map((d) => d.token)).size).toBe(expected);
			}),
		);
	});
});

describe("suppressContent", () => {
	it("writes the annotation above each listed line", () => {
		const source = ["a: 1", "  {{ if .Values.a }}", "  x: 1", "  {{ end }}", "{{ if .Values.b }}"].join("\n");

		expect(suppressContent(source, [4, 1])).toBe(
			[
				"a: 1",
				"  # branchtrace:ignore",
				"  {{ if .Values.a }}",
				"  x: 1",
				"  {{ end }}",
				"# branchtrace:ignore",
				"{{ if .Values.b }}",
			].join("\n"),
		);
	});

	it("collapses duplicates and skips out-of-range lines", () => {
		expect(suppressContent("{{ if .Values.a }}", [0, 0, 7, -1])).toBe(
			"# branchtrace:ignore\n{{ if .Values.a }}",
		);
	});

	it("keeps suppressed branches out of the next instrumentation", () => {
		const source = ["{{ if .Values.a }}", "a: 1", "{{ end }}", "{{ if .Values.b }}", "b: 1", "{{ end }}"].join("\n");
		const suppressed = suppressContent(source, [3]);
		const result = instrumentContent(suppressed, counter());
		expect(result.declarations.map((d) => d.source)).toEqual(["{{ if .Values.a }}"]);
	});
});
