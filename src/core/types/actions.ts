// CHANGE: Closed set of post-render actions
// WHY: Policy checks, recursive descent and observers are all "do something with one rendered
//      directory"; a tagged union matched exhaustively replaces open-ended callback injection
// PURITY: CORE (types only)
// INVARIANT: Every action is run once per rendered output directory
// COMPLEXITY: O(1)

import type { ObserverFn, RecursionRule } from "./config.js";

export type PostRenderAction =
	| { readonly _tag: "PolicyCheck"; readonly policiesDir: string }
	| {
			readonly _tag: "RecursiveDescent";
			readonly index: number;
			readonly rule: RecursionRule;
	  }
	| { readonly _tag: "Observer"; readonly observe: ObserverFn };
