import { DimensionMismatchError } from './errors';
import { PositionMap } from './positionMap';

/** A text together with the map from the text it was derived from. */
export interface MappedText {
	readonly text: string;
	readonly map: PositionMap;
}

/**
 * Builds a string and the map leading to it incrementally.
 * Each appended chunk carries the map from its own slice of the source to the chunk text.
 */
export class MappedTextBuilder {
	private readonly _parts: string[] = [];
	private readonly _maps: PositionMap[] = [];
	private _length = 0;
	private _sourceLength = 0;

	/** Length of the text built so far. */
	get length(): number {
		return this._length;
	}

	/** Number of source positions covered so far. */
	get sourceLength(): number {
		return this._sourceLength;
	}

	append(text: string, map: PositionMap): this {
		if (map.targetLength !== text.length) {
			throw new DimensionMismatchError(
				`Chunk of length ${text.length} comes with a map to a target of length ${map.targetLength}`
			);
		}

		this._parts.push(text);
		this._maps.push(map);
		this._length += text.length;
		this._sourceLength += map.sourceLength;
		return this;
	}

	/** Appends text that is carried over from the source unchanged. */
	appendUnchanged(text: string): this {
		return this.append(text, PositionMap.identity(text.length));
	}

	build(): MappedText {
		return {
			text: this._parts.join(''),
			map: PositionMap.concatAll(this._maps),
		};
	}
}
