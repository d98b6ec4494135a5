// CHANGE: Extraction function for manifests embedded in a rendered ConfigMap
// WHY: Some charts ship resources as ConfigMap values; they only become lintable after the first render
// PURITY: SHELL
// EFFECT: Effect<void, Error>
// INVARIANT: Writes one `<key>.yaml` per entry of `.data`; never writes outside targetDir
// COMPLEXITY: O(n) where n = size of the ConfigMap

import { Effect } from "effect";
import { parse } from "yaml";

import type { RecursionFn } from "../../core/types/index.js";
import { toError } from "../../core/types/index.js";
import { fsPromises, path } from "../../utils/node-mods.js";
import { TEMPLATE_EXTENSION } from "../fs/walk.js";

type ConfigMapData = Readonly<Record<string, string>>;

function isRecord(value: unknown): value is Readonly<Record<string, unknown>> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Reads `.data` out of a parsed ConfigMap document.
 *
 * @pure true
 * @returns data entries, {} when the document has no data, or an Error for a malformed document
 */
export function configMapData(document: unknown): ConfigMapData | Error {
	if (!isRecord(document)) {
		return new Error("manifest is not a YAML mapping");
	}
	const data = document["data"];
	if (data === undefined || data === null) {
		return {};
	}
	if (!isRecord(data)) {
		return new Error("ConfigMap .data is not a mapping");
	}

	const entries: Record<string, string> = {};
	for (const [key, value] of Object.entries(data)) {
		if (typeof value !== "string") {
			return new Error(`ConfigMap .data.${key} is not a string`);
		}
		entries[key] = value;
	}
	return entries;
}

/**
 * File name for one ConfigMap key.
 *
 * @pure true
 * @example manifestFileName("deploy") === "deploy.yaml"
 * @example manifestFileName("deploy.yaml") === "deploy.yaml"
 */
export function manifestFileName(key: string): string | Error {
	if (key.includes("/") || key.includes("\\") || key === "." || key === "..") {
		return new Error(`ConfigMap key ${JSON.stringify(key)} is not a file name`);
	}
	return key.endsWith(TEMPLATE_EXTENSION) ? key : `${key}${TEMPLATE_EXTENSION}`;
}

/**
 * Recurses into the manifests stored in each key of a ConfigMap.
 *
 * @param manifestPath - Path of the rendered ConfigMap, relative to the rendered directory
 *                       (e.g. "mychart/templates/configmap.yaml")
 *
 * @example
 * ```ts
 * lint({ recursions: [{ extract: recurseConfigmap("mychart/templates/configmap.yaml") }] });
 * ```
 */
export function recurseConfigmap(manifestPath: string): RecursionFn {
	return (renderedDir, targetDir) =>
		Effect.gen(function* () {
			const body = yield* Effect.tryPromise({
				try: () => fsPromises.readFile(path.join(renderedDir, manifestPath), "utf8"),
				catch: toError,
			});
			const document: unknown = yield* Effect.try({
				try: () => parse(body),
				catch: toError,
			});

			const data = configMapData(document);
			if (data instanceof Error) {
				return yield* Effect.fail(data);
			}

			for (const [key, value] of Object.entries(data)) {
				const fileName = manifestFileName(key);
				if (fileName instanceof Error) {
					return yield* Effect.fail(fileName);
				}
				yield* Effect.tryPromise({
					try: () => fsPromises.writeFile(path.join(targetDir, fileName), value, "utf8"),
					catch: toError,
				});
			}
		});
}
