// CHANGE: Per-run context passed explicitly to every stage
// WHY: No module-level state; the worker pool, the failure collector and the engines belong to one run
// PURITY: SHELL
// EFFECT: Effect<RunContext>
// INVARIANT: Only leaf units of work take a pool permit (no nested acquisition, so no self-deadlock)
// COMPLEXITY: O(1)

import { Effect, Ref } from "effect";

import type { RunFailure } from "../../core/errors.js";
import type { Engines, FinalizedOptions } from "../../core/types/index.js";
import type { Workspace } from "../workspace/workspace.js";

/**
 * Append-only, fiber-safe list of reported failures.
 */
export interface FailureCollector {
	readonly record: (failure: RunFailure) => Effect.Effect<void>;
	readonly drain: Effect.Effect<readonly RunFailure[]>;
}

export interface RunContext {
	readonly options: FinalizedOptions;
	readonly engines: Engines;
	readonly workspace: Workspace;
	readonly failures: FailureCollector;
	/** Runs one unit of work on the shared, bounded pool. */
	readonly submit: <A, E, R>(
		work: Effect.Effect<A, E, R>,
	) => Effect.Effect<A, E, R>;
}

/**
 * Creates a failure collector backed by a Ref; the critical section is the append itself.
 *
 * @pure false (allocates a Ref)
 */
export function makeFailureCollector(): Effect.Effect<FailureCollector> {
	return Effect.gen(function* () {
		const ref = yield* Ref.make<readonly RunFailure[]>([]);
		return {
			record: (failure) => Ref.update(ref, (all) => [...all, failure]),
			drain: Ref.get(ref),
		};
	});
}

/**
 * Builds the context of one run.
 *
 * @param options - Finalized options; `concurrency` sizes the pool
 * @param engines - Renderer and policy engine
 * @param workspace - Temporary directories of this run
 */
export function makeRunContext(
	options: FinalizedOptions,
	engines: Engines,
	workspace: Workspace,
): Effect.Effect<RunContext> {
	return Effect.gen(function* () {
		const pool = yield* Effect.makeSemaphore(options.concurrency);
		const failures = yield* makeFailureCollector();
		return {
			options,
			engines,
			workspace,
			failures,
			submit: (work) => pool.withPermits(1)(work),
		};
	});
}
