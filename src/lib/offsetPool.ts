/** A pool of small integer line offsets, handed out smallest-available-first.
 * * offsets below the pool's "fresh" frontier are either in use or held in a min-heap of released offsets
 * * `acquire()` and `release()` are O(log n)
 */
export class OffsetPool {
	#inUse = new Set<number>();
	#released: number[] = []; // binary min-heap
	#next: number;
	#highWater = 0;

	/**
	 * @param first  smallest offset handed out, default: 1 (offset 0 belongs to the aggregate line)
	 */
	constructor(readonly first = 1) {
		this.#next = first;
	}

	/** Largest offset ever handed out (0 if none). */
	get highWater(): number {
		return this.#highWater;
	}

	/** Offsets currently in use, ascending. */
	get inUse(): number[] {
		return [...this.#inUse].sort((a, b) => a - b);
	}

	has(offset: number): boolean {
		return this.#inUse.has(offset);
	}

	/** Take the smallest offset not currently in use. */
	acquire(): number {
		const offset = (this.#released.length > 0) ? this.#popReleased() : this.#next++;
		this.#inUse.add(offset);
		this.#highWater = Math.max(this.#highWater, offset);
		return offset;
	}

	/** Return `offset` to the pool; releasing an offset not in use is a no-op. */
	release(offset: number): void {
		if (!this.#inUse.delete(offset)) return;
		this.#pushReleased(offset);
	}

	//=== min-heap

	#pushReleased(offset: number): void {
		const heap = this.#released;
		heap.push(offset);
		let idx = heap.length - 1;
		while (idx > 0) {
			const parent = (idx - 1) >> 1;
			if (heap[parent] <= heap[idx]) break;
			[heap[parent], heap[idx]] = [heap[idx], heap[parent]];
			idx = parent;
		}
	}

	#popReleased(): number {
		const heap = this.#released;
		const top = heap[0];
		const last = heap.pop();
		if ((heap.length > 0) && (last !== undefined)) {
			heap[0] = last;
			let idx = 0;
			for (;;) {
				const left = 2 * idx + 1;
				const right = left + 1;
				let smallest = idx;
				if ((left < heap.length) && (heap[left] < heap[smallest])) smallest = left;
				if ((right < heap.length) && (heap[right] < heap[smallest])) smallest = right;
				if (smallest === idx) break;
				[heap[smallest], heap[idx]] = [heap[idx], heap[smallest]];
				idx = smallest;
			}
		}
		return top;
	}
}
