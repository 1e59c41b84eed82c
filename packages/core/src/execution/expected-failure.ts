/**
 * Expected Failure
 *
 * Scope guard that inverts the interpretation of the checks it encloses.
 * Only one enabled scope may be active at a time.
 */

import type { RunState } from "./run-state";
import { TesterUsageError } from "./signals";

export class ExpectedFailure {
	private released = false;

	/**
	 * Enter the scope. A disabled scope registers nothing and behaves as if
	 * it were absent.
	 */
	constructor(
		private readonly state: RunState,
		readonly message: string,
		readonly enabled = true,
	) {
		if (!enabled) {
			return;
		}
		if (state.expectedFailure) {
			throw new TesterUsageError(
				`Expected failure "${message}" entered while "${state.expectedFailure.message}" is still active`,
			);
		}
		state.expectedFailure = this;
	}

	/**
	 * Leave the scope
	 */
	release(): void {
		if (this.released) {
			return;
		}
		this.released = true;
		if (this.state.expectedFailure === this) {
			this.state.expectedFailure = undefined;
		}
	}

	/**
	 * Run a body inside a new scope, releasing it once the body settles
	 */
	static run(
		state: RunState,
		message: string,
		enabled: boolean,
		body: () => void | Promise<void>,
	): void | Promise<void> {
		const scope = new ExpectedFailure(state, message, enabled);

		let result: void | Promise<void>;
		try {
			result = body();
		} catch (error) {
			scope.release();
			throw error;
		}

		if (result instanceof Promise) {
			return result.finally(() => scope.release());
		}
		scope.release();
		return undefined;
	}
}
