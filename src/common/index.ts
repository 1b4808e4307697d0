export { Span } from './span';
export { PositionMap, type SpanLike, type SpanColumns } from './positionMap';
export { MappedTextBuilder, type MappedText } from './mappedTextBuilder';
export {
    MappingError,
    InvalidMapError,
    DimensionMismatchError,
    LengthMismatchError,
    UnsupportedStepError,
    NoPathFoundError,
    CycleDetectedError,
} from './errors';
export type { Logger } from './logger';
