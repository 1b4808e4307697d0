/**
 * A span of positions [start, stop).
 * Unlike a plain range, `stop` may be lower than `start`: the span is then empty
 * but stays anchored at `start`, which position maps rely on to keep track of
 * where deleted elements used to be.
 * Immutable.
 */
export class Span {
	constructor(
		public readonly start: number,
		public readonly stop: number
	) { }

	static ofLength(start: number, length: number): Span {
		return new Span(start, start + length);
	}

	get isEmpty(): boolean {
		return this.stop <= this.start;
	}

	get length(): number {
		return Math.max(0, this.stop - this.start);
	}

	/**
	 * Extract the covered substring. Empty spans yield '' whatever their anchor.
	 */
	substring(text: string): string {
		// substring() would swap reversed bounds
		return this.isEmpty ? '' : text.substring(this.start, this.stop);
	}

	equals(other: Span): boolean {
		return this.start === other.start && this.stop === other.stop;
	}

	toString(): string {
		return `[${this.start}, ${this.stop})`;
	}

	toJSON(): { start: number; stop: number } {
		return { start: this.start, stop: this.stop };
	}
}
