// CHANGE: Render the instrumented chart once per fixture
// WHY: Coverage against a partially rendered chart is meaningless, so every fixture must render;
//      failures are collected so one broken fixture does not hide another
// PURITY: SHELL
// EFFECT: Effect<ReadonlyArray<RenderedOutput>, RenderFailed>
// INVARIANT: Fails only after every in-flight render finished; |outputs| = |fixtures| on success
// COMPLEXITY: O(f) renders where f = |fixtures|, at most `concurrency` at a time

import { Console, Effect } from "effect";

import { RenderError, RenderFailed } from "../../core/errors.js";
import type { Fixture, RenderedOutput } from "../../core/models.js";
import { outputOrReason } from "../../core/types/index.js";
import { path } from "../../utils/node-mods.js";
import type { RunContext } from "../run/context.js";

function renderFixture(
	ctx: Pick<RunContext, "engines" | "workspace">,
	fixture: Fixture,
): Effect.Effect<RenderedOutput, RenderError> {
	const dir = path.join(ctx.workspace.resultsDir, fixture.name);
	return Effect.gen(function* () {
		yield* Console.log(`🧪 Rendering fixture ${fixture.name}`);
		const result = yield* ctx.engines.renderer
			.render(ctx.workspace.chartDir, fixture.path, dir)
			.pipe(
				Effect.mapError(
					(error) =>
						new RenderError({
							fixture: fixture.name,
							output: `${error.command}: ${error.detail}`,
						}),
				),
			);
		if (result.exitCode !== 0) {
			return yield* Effect.fail(
				new RenderError({
					fixture: fixture.name,
					output: outputOrReason(
						result.output,
						`${ctx.engines.renderer.name} exited with status ${result.exitCode}`,
					),
				}),
			);
		}
		return { fixture: fixture.name, dir };
	});
}

/**
 * Renders every fixture on the run pool.
 *
 * @param ctx - Run context (engines, workspace, pool)
 * @param fixtures - Fixtures to render
 * @returns Output directories in fixture order
 *
 * @pure false (spawns the renderer)
 * @effect Effect<ReadonlyArray<RenderedOutput>, RenderFailed>
 */
export function renderFixtures(
	ctx: Pick<RunContext, "engines" | "workspace" | "submit">,
	fixtures: readonly Fixture[],
): Effect.Effect<readonly RenderedOutput[], RenderFailed> {
	return Effect.gen(function* () {
		const started = Date.now();
		const [failures, outputs] = yield* Effect.partition(
			fixtures,
			(fixture) => ctx.submit(renderFixture(ctx, fixture)),
			{ concurrency: "unbounded" },
		);
		yield* Console.log(
			`⏱️  Rendered ${outputs.length}/${fixtures.length} fixtures in ${Date.now() - started}ms`,
		);
		if (failures.length > 0) {
			return yield* Effect.fail(new RenderFailed({ failures }));
		}
		return outputs;
	});
}
