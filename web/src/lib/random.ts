export type Random = () => number;

/** Linear congruential generator yielding floats in [0, 1). */
export function createRandom(seed: number): Random {
	let state = seed >>> 0;
	return () => {
		state = (1664525 * state + 1013904223) >>> 0;
		return state / 4294967296;
	};
}

/**
 * Picks `count` distinct indices from `[0, length)` with a partial
 * Fisher-Yates shuffle. Indices come back ascending.
 */
export function sampleIndices(
	length: number,
	count: number,
	random: Random,
): number[] {
	const size = Math.max(0, Math.min(count, length));
	const pool = Array.from({ length }, (_, index) => index);
	for (let position = 0; position < size; position += 1) {
		const swapWith = position + Math.floor(random() * (length - position));
		const current = pool[position];
		pool[position] = pool[swapWith];
		pool[swapWith] = current;
	}
	return pool.slice(0, size).sort((a, b) => a - b);
}
