/**
 * Test Case Registry
 *
 * Ordered, append-only list of test cases. Ordinals follow registration
 * order and start at 1.
 */

import type { TestCase, TestCaseFunction } from "./execution.types";
import { TesterUsageError } from "./signals";

export class TestCaseRegistry {
	private readonly cases: TestCase[] = [];
	private sealed = false;

	/**
	 * Register a group of cases sharing optional setup and teardown
	 */
	add(bodies: readonly TestCaseFunction[], setup?: TestCaseFunction, teardown?: TestCaseFunction): void {
		if (this.sealed) {
			throw new TesterUsageError("Test cases cannot be added once the suite has started running");
		}
		if (bodies.length === 0) {
			throw new TesterUsageError("A test case group must contain at least one test case");
		}

		const unnamed = bodies.findIndex((body) => !body.name);
		if (unnamed !== -1) {
			throw new TesterUsageError(`Test case ${this.cases.length + unnamed + 1} has no name`);
		}

		for (const body of bodies) {
			this.cases.push({
				id: this.cases.length + 1,
				name: body.name,
				body,
				setup,
				teardown,
			});
		}
	}

	/**
	 * Finalize the registry; later registrations are rejected
	 */
	seal(): void {
		this.sealed = true;
	}

	get size(): number {
		return this.cases.length;
	}

	/**
	 * Get cases by ordinal, in registration order
	 */
	select(ids: Iterable<number>): TestCase[] {
		const wanted = new Set(ids);
		return this.cases.filter((testCase) => wanted.has(testCase.id));
	}

	getAll(): readonly TestCase[] {
		return this.cases;
	}
}
