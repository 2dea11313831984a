/**
 * A saved narrowing of the candidate universe. `undefined` indices mean the
 * universe is unrestricted. Each save replaces the previous snapshot; scopes
 * are never merged.
 */
export class ActiveScope {
	private indices?: readonly number[];

	get isActive(): boolean {
		return this.indices !== undefined;
	}

	get size(): number | undefined {
		return this.indices?.length;
	}

	save(indices: Iterable<number>): void {
		this.indices = Array.from(new Set(indices)).sort((a, b) => a - b);
	}

	clear(): void {
		this.indices = undefined;
	}

	/** Membership by binary search. Always true when no scope is saved. */
	has(index: number): boolean {
		const indices = this.indices;
		if (!indices) return true;

		let low = 0;
		let high = indices.length - 1;
		while (low <= high) {
			const mid = (low + high) >>> 1;
			const value = indices[mid] ?? 0;
			if (value === index) return true;
			if (value < index) {
				low = mid + 1;
			} else {
				high = mid - 1;
			}
		}
		return false;
	}
}
