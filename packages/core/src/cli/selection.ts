/**
 * Selection Filter
 *
 * Reduces the registered cases to the ones that should run.
 */

import type { TesterArguments } from "./arguments";

export interface Selection {
	/** When present, only these ordinals run */
	only?: ReadonlySet<number>;
	skip: ReadonlySet<number>;
}

export const ALL_CASES: Selection = { skip: new Set() };

export function createSelection(args: Pick<TesterArguments, "only" | "skip">): Selection {
	return {
		only: args.only ? new Set(args.only) : undefined,
		skip: new Set(args.skip),
	};
}

/**
 * Ordinals to run, in registration order. `skip` is applied after `only`;
 * ordinals beyond the registry are ignored.
 */
export function selectIds(total: number, selection: Selection): number[] {
	const ids: number[] = [];
	for (let id = 1; id <= total; id++) {
		if (selection.only && !selection.only.has(id)) continue;
		if (selection.skip.has(id)) continue;
		ids.push(id);
	}
	return ids;
}
