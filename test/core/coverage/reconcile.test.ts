// CHANGE: Specs for coverage reconciliation
// FORMAT THEOREM: covered + |uncovered| = |R|
// PURITY: CORE

import fc from "fast-check";
import { describe, expect, it } from "vitest";

import {
	coveragePercent,
	groupByFile,
	reconcile,
} from "../../../src/core/coverage/reconcile.js";
import type { Declaration } from "../../../src/core/models.js";

const decl = (file: string, line: number): Declaration => ({
	file,
	line,
	source: `{{ if .Values.l${line} }}`,
});

describe("reconcile", () => {
	it("reports declarations whose token did not survive, sorted by file and line", () => {
		const registry = new Map<string, Declaration>([
			["a", decl("templates/svc.yaml", 3)],
			["b", decl("templates/deploy.yaml", 9)],
			["c", decl("templates/deploy.yaml", 2)],
			["d", decl("templates/deploy.yaml", 5)],
		]);

		const summary = reconcile(registry, new Set(["d", "unknown"]));

		expect(summary.declarations).toBe(4);
		expect(summary.covered).toBe(1);
		expect(summary.uncovered).toEqual([
			decl("templates/deploy.yaml", 2),
			decl("templates/deploy.yaml", 9),
			decl("templates/svc.yaml", 3),
		]);
	});

	it("keeps covered + uncovered equal to the registry size", () => {
		fc.assert(
			fc.property(
				fc.uniqueArray(fc.string({ minLength: 1, maxLength: 6 }), { maxLength: 20 }),
				fc.array(fc.string({ minLength: 1, maxLength: 6 }), { maxLength: 20 }),
				(tokens, surviving) => {
					const registry = new Map(
						tokens.map((t, i): [string, Declaration] => [t, decl("a.yaml", i)]),
					);
					const summary = reconcile(registry, new Set(surviving));
					expect(summary.covered + summary.uncovered.length).toBe(registry.size);
				},
			),
		);
	});
});

describe("groupByFile", () => {
	it("collects lines per file", () => {
		const grouped = groupByFile([decl("a.yaml", 1), decl("b.yaml", 4), decl("a.yaml", 7)]);
		expect([...grouped.entries()]).toEqual([
			["a.yaml", [1, 7]],
			["b.yaml", [4]],
		]);
	});
});

describe("coveragePercent", () => {
	it("counts an empty registry as fully covered", () => {
		expect(coveragePercent({ declarations: 0, covered: 0 })).toBe(100);
	});

	it("rounds to one decimal", () => {
		expect(coveragePercent({ declarations: 3, covered: 2 })).toBe(66.7);
	});
});
