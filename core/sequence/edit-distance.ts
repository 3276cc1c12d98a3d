/**
 * Levenshtein distance over token sequences.
 *
 * Unit cost for insertion, deletion and substitution; no transpositions.
 * Tokens are compared with `===`, so any element type works as long as equal
 * tokens are the same primitive value.
 */

/**
 * Per-operation breakdown of a minimal alignment.
 */
export interface EditOperationCounts {
	distance: number;
	substitutions: number;
	deletions: number;
	insertions: number;
	matches: number;
}

/**
 * Minimum number of single-token edits turning `a` into `b`.
 * Space-optimized DP: two rows of length |b| + 1.
 */
export function editDistance<T>(a: readonly T[], b: readonly T[]): number {
	if (a.length === 0) return b.length;
	if (b.length === 0) return a.length;

	let prev = Array.from({ length: b.length + 1 }, (_, j) => j);
	let curr = new Array<number>(b.length + 1).fill(0);

	for (let i = 1; i <= a.length; i++) {
		curr[0] = i;
		const aItem = a[i - 1];
		for (let j = 1; j <= b.length; j++) {
			const cost = aItem === b[j - 1] ? 0 : 1;
			curr[j] = Math.min(
				(prev[j] ?? 0) + 1,
				(curr[j - 1] ?? 0) + 1,
				(prev[j - 1] ?? 0) + cost,
			);
		}
		[prev, curr] = [curr, prev];
	}

	return prev[b.length] ?? 0;
}

/**
 * Build the full (|a|+1) x (|b|+1) distance table.
 */
function buildTable<T>(a: readonly T[], b: readonly T[]): number[][] {
	const table: number[][] = [];
	for (let i = 0; i <= a.length; i++) {
		const row = new Array<number>(b.length + 1).fill(0);
		row[0] = i;
		table.push(row);
	}
	const first = table[0] ?? [];
	for (let j = 0; j <= b.length; j++) {
		first[j] = j;
	}

	for (let i = 1; i <= a.length; i++) {
		const row = table[i] ?? [];
		const above = table[i - 1] ?? [];
		for (let j = 1; j <= b.length; j++) {
			const cost = a[i - 1] === b[j - 1] ? 0 : 1;
			row[j] = Math.min(
				(above[j] ?? 0) + 1,
				(row[j - 1] ?? 0) + 1,
				(above[j - 1] ?? 0) + cost,
			);
		}
	}

	return table;
}

/**
 * Count substitutions, deletions and insertions along one minimal alignment.
 *
 * Backtrace order on ties: match, substitution, deletion, insertion.
 * `a` is the reference side, so a deletion drops a token of `a` and an
 * insertion adds a token of `b`.
 */
export function editOperations<T>(
	a: readonly T[],
	b: readonly T[],
): EditOperationCounts {
	const table = buildTable(a, b);
	const at = (i: number, j: number): number => table[i]?.[j] ?? 0;

	const counts: EditOperationCounts = {
		distance: at(a.length, b.length),
		substitutions: 0,
		deletions: 0,
		insertions: 0,
		matches: 0,
	};

	let i = a.length;
	let j = b.length;
	while (i > 0 || j > 0) {
		const here = at(i, j);
		if (i > 0 && j > 0 && a[i - 1] === b[j - 1] && here === at(i - 1, j - 1)) {
			counts.matches++;
			i--;
			j--;
		} else if (i > 0 && j > 0 && here === at(i - 1, j - 1) + 1) {
			counts.substitutions++;
			i--;
			j--;
		} else if (i > 0 && here === at(i - 1, j) + 1) {
			counts.deletions++;
			i--;
		} else {
			counts.insertions++;
			j--;
		}
	}

	return counts;
}
