/** Base class for errors raised while building or combining position maps. */
export class MappingError extends Error {
	constructor(message: string) {
		super(message);
		this.name = new.target.name;
	}
}

/** Span bounds out of range or columns that are not non-decreasing. */
export class InvalidMapError extends MappingError { }

/** Two maps (or a map and its data) do not share the required space size. */
export class DimensionMismatchError extends MappingError { }

/** Projected data does not have one entry per source position. */
export class LengthMismatchError extends DimensionMismatchError { }

/** Range lookups only support a step of 1. */
export class UnsupportedStepError extends MappingError { }

/** `composeByName` cannot reach the requested target space. */
export class NoPathFoundError extends MappingError { }

/** `composeByName` visited the same map twice. */
export class CycleDetectedError extends MappingError { }
