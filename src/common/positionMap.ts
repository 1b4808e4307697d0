import {
	CycleDetectedError,
	DimensionMismatchError,
	InvalidMapError,
	LengthMismatchError,
	MappingError,
	NoPathFoundError,
	UnsupportedStepError,
} from './errors';
import { Span } from './span';

/** A span given either as a `Span` or as a `[start, stop]` tuple. */
export type SpanLike = Span | readonly [start: number, stop: number];

/** The two columns of a map, given separately. */
export interface SpanColumns {
	readonly starts: ArrayLike<number>;
	readonly stops: ArrayLike<number>;
}

function clamp(value: number, low: number, high: number): number {
	return Math.min(Math.max(value, low), high);
}

function validateColumns(starts: ArrayLike<number>, stops: ArrayLike<number>, targetLength: number): void {
	if (!Number.isInteger(targetLength) || targetLength < 0) {
		throw new InvalidMapError(`Invalid target length: ${targetLength}`);
	}
	if (starts.length !== stops.length) {
		throw new InvalidMapError(`Got ${starts.length} span starts but ${stops.length} span stops`);
	}

	for (let i = 0; i < starts.length; i++) {
		const start = starts[i];
		const stop = stops[i];
		if (!Number.isInteger(start) || !Number.isInteger(stop) ||
			start < 0 || stop < 0 || start > targetLength || stop > targetLength) {
			throw new InvalidMapError(
				`Span ${i} [${start}, ${stop}) is out of bounds for a target of length ${targetLength}`
			);
		}
		if (i > 0 && (start < starts[i - 1] || stop < stops[i - 1])) {
			throw new InvalidMapError(
				`Span starts and stops must be non-decreasing. ` +
				`Span ${i} is [${start}, ${stop}), but span ${i - 1} is [${starts[i - 1]}, ${stops[i - 1]}).`
			);
		}
	}
}

/**
 * Writes into `out` (of the column's bound length) the index of the entry at which the
 * column's running value first covers each target position. Positions are filled in runs,
 * one run per point of interest.
 */
function spreadPointsOfInterest(column: Int32Array, bound: number, out: Int32Array): void {
	let previous = 0;
	for (let k = 0; k <= column.length; k++) {
		const value = k < column.length ? column[k] : bound;
		if (value !== previous) {
			out.fill(k, previous, value);
			previous = value;
		}
	}
}

/**
 * Monotone, many-to-many mapping from a source space X to a target space Y.
 *
 * Source position `i` maps to `Y[start_i, stop_i)`, and a source range `[i, j)` maps to
 * `Y[start_i, stop_(j-1))`. An element of X can correspond to zero or more consecutive
 * elements of Y; consecutive spans may overlap or leave gaps.
 *
 * Invariants: starts and stops lie in `[0, targetLength]` and neither column decreases.
 * A span may have `stop < start`: it is empty, but anchored at `start`. The anchor is what
 * makes `inverse()` and `concat()` round-trip, do not normalize it away.
 * Immutable.
 */
export class PositionMap {
	private readonly _starts: Int32Array;
	private readonly _stops: Int32Array;

	/**
	 * @throws InvalidMapError if a span is out of bounds or the columns decrease
	 */
	constructor(spans: readonly SpanLike[] | SpanColumns, public readonly targetLength: number) {
		let starts: ArrayLike<number>;
		let stops: ArrayLike<number>;
		if ('starts' in spans) {
			({ starts, stops } = spans);
		} else {
			starts = spans.map(span => span instanceof Span ? span.start : span[0]);
			stops = spans.map(span => span instanceof Span ? span.stop : span[1]);
		}

		validateColumns(starts, stops, targetLength);
		this._starts = Int32Array.from(starts);
		this._stops = Int32Array.from(stops);
	}

	static fromColumns(starts: ArrayLike<number>, stops: ArrayLike<number>, targetLength: number): PositionMap {
		return new PositionMap({ starts, stops }, targetLength);
	}

	/** Size of the source space. */
	get sourceLength(): number {
		return this._starts.length;
	}

	/** The span of source position `index`. */
	at(index: number): Span {
		return this.range(index, index + 1);
	}

	/**
	 * The span covered by the source range `[start, end)`, from the start of its first
	 * entry to the stop of its last. Bounds are clamped into `[0, sourceLength]`.
	 *
	 * An empty range still yields a span anchored consistently with its neighbours, so
	 * that slicing the target with it gives an empty string at the right place.
	 */
	range(start?: number, end?: number, step?: number): Span {
		if (step !== undefined && step !== 1) {
			throw new UnsupportedStepError(`Only a step of 1 is supported, got ${step}`);
		}

		const n = this.sourceLength;
		const i = clamp(start ?? 0, 0, n);
		const j = clamp(end ?? n, 0, n);
		if (i < j) {
			return new Span(this._starts[i], this._stops[j - 1]);
		}

		const anchor = i < n ? this._starts[i] : this.targetLength;
		const stop = i > 0 ? this._stops[i - 1] : 0;
		return new Span(anchor, Math.max(anchor, stop));
	}

	*spans(): IterableIterator<Span> {
		for (let i = 0; i < this.sourceLength; i++) {
			yield new Span(this._starts[i], this._stops[i]);
		}
	}

	/**
	 * Projects data from the source space to the target space.
	 * Positions of the target that nothing maps to receive `fallback`. Where spans overlap,
	 * the rightmost source element wins.
	 */
	project<T>(data: ArrayLike<T>): (T | undefined)[];
	project<T>(data: ArrayLike<T>, fallback: T): T[];
	project<T>(data: ArrayLike<T>, fallback?: T): (T | undefined)[] {
		if (data.length !== this.sourceLength) {
			throw new LengthMismatchError(
				`Cannot project ${data.length} elements through a map with a source of length ${this.sourceLength}`
			);
		}

		const projected = new Array<T | undefined>(this.targetLength).fill(fallback);
		for (let i = 0; i < this.sourceLength; i++) {
			projected.fill(data[i], this._starts[i], this._stops[i]);
		}
		return projected;
	}

	/**
	 * With this map going from X to Y, returns the map from Y to X.
	 * Gaps and overlaps survive the round trip: `m.inverse().inverse()` equals `m`.
	 */
	inverse(): PositionMap {
		const starts = new Int32Array(this.targetLength);
		const stops = new Int32Array(this.targetLength);
		// A target position starts where the stop column first reaches past it,
		// and stops where the start column does.
		spreadPointsOfInterest(this._stops, this.targetLength, starts);
		spreadPointsOfInterest(this._starts, this.targetLength, stops);
		return new PositionMap({ starts, stops }, this.sourceLength);
	}

	/**
	 * With this map going from X to Y and `other` from Y to Z, returns the map from X to Z.
	 */
	compose(other: PositionMap): PositionMap {
		if (this.targetLength !== other.sourceLength) {
			throw new DimensionMismatchError(
				`Cannot compose a ${this.sourceLength}x${this.targetLength} map ` +
				`with a ${other.sourceLength}x${other.targetLength} map`
			);
		}

		const starts = new Int32Array(this.sourceLength);
		const stops = new Int32Array(this.sourceLength);
		for (let i = 0; i < this.sourceLength; i++) {
			const span = other.range(this._starts[i], this._stops[i]);
			starts[i] = span.start;
			stops[i] = span.stop;
		}
		return new PositionMap({ starts, stops }, other.targetLength);
	}

	/**
	 * With this map going from Xi to Yi and `other` from Xj to Yj, returns the map from
	 * Xi + Xj to Yi + Yj.
	 */
	concat(other: PositionMap): PositionMap {
		return PositionMap.concatAll([this, other]);
	}

	/** Concatenates any number of maps end to end, in one pass. */
	static concatAll(maps: readonly PositionMap[]): PositionMap {
		const sourceLength = maps.reduce((total, map) => total + map.sourceLength, 0);
		const starts = new Int32Array(sourceLength);
		const stops = new Int32Array(sourceLength);

		let sourceOffset = 0;
		let targetOffset = 0;
		for (const map of maps) {
			starts.set(map._starts.map(start => start + targetOffset), sourceOffset);
			stops.set(map._stops.map(stop => stop + targetOffset), sourceOffset);
			sourceOffset += map.sourceLength;
			targetOffset += map.targetLength;
		}
		return new PositionMap({ starts, stops }, targetOffset);
	}

	equals(other: PositionMap): boolean {
		if (this.sourceLength !== other.sourceLength || this.targetLength !== other.targetLength) {
			return false;
		}
		for (let i = 0; i < this.sourceLength; i++) {
			if (this._starts[i] !== other._starts[i] || this._stops[i] !== other._stops[i]) {
				return false;
			}
		}
		return true;
	}

	toString(): string {
		const spans = Array.from(this.spans(), span => `(${span.start}, ${span.stop})`);
		return `<${this.sourceLength}x${this.targetLength} map: [${spans.join(', ')}]>`;
	}

	static empty(): PositionMap {
		return new PositionMap([], 0);
	}

	static identity(length: number): PositionMap {
		return PositionMap.slice(0, length, length);
	}

	/**
	 * Every element of the source maps to the whole target, e.g. a stretch of text that was
	 * replaced as a unit.
	 */
	static full(sourceLength: number, targetLength: number): PositionMap {
		const starts = new Int32Array(sourceLength);
		const stops = new Int32Array(sourceLength).fill(targetLength);
		return new PositionMap({ starts, stops }, targetLength);
	}

	/**
	 * Spreads the smaller space as evenly as possible over the larger one. For 6 source and
	 * 12 target positions, source `[2, 3)` maps to target `[4, 6)`.
	 */
	static lerp(sourceLength: number, targetLength: number): PositionMap {
		const low = Math.min(sourceLength, targetLength);
		const high = Math.max(sourceLength, targetLength);

		const starts = new Int32Array(high);
		const stops = new Int32Array(high);
		for (let k = 0; k < high; k++) {
			const position = Math.floor(k * low / high);
			starts[k] = position;
			stops[k] = Math.min(position + 1, low);
		}

		const spread = new PositionMap({ starts, stops }, low);
		return targetLength === low ? spread : spread.inverse();
	}

	/**
	 * Maps a source of `end - start` elements onto `[start, end)` of a target of
	 * `targetLength` elements. The inverse of `eye()`.
	 */
	static slice(start: number, end: number, targetLength: number): PositionMap {
		if (!(0 <= start && start <= end && end <= targetLength)) {
			throw new InvalidMapError(`Invalid slice [${start}, ${end}) in a target of length ${targetLength}`);
		}
		const starts = new Int32Array(end - start);
		for (let i = 0; i < starts.length; i++) {
			starts[i] = start + i;
		}
		return new PositionMap({ starts, stops: starts.map(s => s + 1) }, targetLength);
	}

	/**
	 * Maps `[start, end)` of a source of `length` elements onto a target of `end - start`
	 * elements; the elements outside of it map to nothing. The inverse of `slice()`.
	 */
	static eye(start: number, end: number, length: number): PositionMap {
		if (!(0 <= start && start <= end && end <= length)) {
			throw new InvalidMapError(`Invalid slice [${start}, ${end}) in a source of length ${length}`);
		}
		return PositionMap.full(start, 0)
			.concat(PositionMap.identity(end - start))
			.concat(PositionMap.full(length - end, 0));
	}

	/** Source position `i` maps to `[positions[i], positions[i] + 1)`. */
	static fromOneToOne(positions: ArrayLike<number>, targetLength: number): PositionMap {
		const starts = Int32Array.from(positions);
		return new PositionMap({ starts, stops: starts.map(p => p + 1) }, targetLength);
	}

	/**
	 * Non-cumulative form: source position `i` maps to the next `lengths[i]` target positions.
	 */
	static fromRanges(lengths: Iterable<number>): PositionMap {
		const starts: number[] = [];
		const stops: number[] = [];
		let position = 0;
		for (const length of lengths) {
			starts.push(position);
			stops.push(position + length);
			position += length;
		}
		return new PositionMap({ starts, stops }, position);
	}

	/**
	 * Composes maps named after the `<source>2<target>` convention to obtain `mapName`.
	 * For instance `composeByName('a2c', { a2b, b2c })` returns `a2b.compose(b2c)`.
	 * Maps that are not on the path are ignored.
	 */
	static composeByName(mapName: string, maps: Readonly<Record<string, PositionMap>>): PositionMap {
		const [sourceName, targetName] = parseMapName(mapName);
		const entries = Object.entries(maps).map(([name, map]) => {
			const [source, target] = parseMapName(name);
			return { source, target, map };
		});
		const names = Object.keys(maps).join(', ');

		const origin = entries.find(entry => entry.source === sourceName);
		if (!origin) {
			throw new NoPathFoundError(`Source "${sourceName}" not found in maps ${names}`);
		}
		if (!entries.some(entry => entry.target === targetName) && sourceName !== targetName) {
			throw new NoPathFoundError(`Target "${targetName}" not found in maps ${names}`);
		}

		let composed: PositionMap | undefined;
		let current = sourceName;
		const visited = new Set<number>();
		while (current !== targetName) {
			const index = entries.findIndex(entry => entry.source === current);
			if (index === -1) {
				throw new NoPathFoundError(`No map leads from "${current}" to "${targetName}" in maps ${names}`);
			}
			if (visited.has(index)) {
				throw new CycleDetectedError(`Cycle detected while composing ${mapName} from maps ${names}`);
			}
			visited.add(index);

			const next = entries[index];
			composed = composed ? composed.compose(next.map) : next.map;
			current = next.target;
		}

		return composed ?? PositionMap.identity(origin.map.sourceLength);
	}
}

function parseMapName(name: string): [source: string, target: string] {
	const parts = name.split('2');
	if (parts.length !== 2) {
		throw new MappingError(`Map names must follow the <source>2<target> convention, got "${name}"`);
	}
	return [parts[0], parts[1]];
}
