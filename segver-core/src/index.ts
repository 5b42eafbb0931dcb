export { AppError, ConfigError, InvalidArgumentError } from './domain/common/Errors.js';
export type { ILogger, LogFormat, LogLevel, LogMetadata } from './domain/common/ILogger.js';
export { checkArgumentNotBlank, isBlank } from './domain/common/preconditions.js';
export { ConsoleLogger } from './infrastructure/common/ConsoleLogger.js';

export { signum, type ComparisonResult } from './versioning/ordering.js';
export {
  classifySegment,
  compareIgnoreCase,
  compareSegments,
  type AlphaSegment,
  type NumericSegment,
  type Segment
} from './versioning/segment.js';
export { parseVersion, tokenizeVersion } from './versioning/tokenizer.js';
export { compareSegmentSequences, compareVersions } from './versioning/comparator.js';
export {
  higherVersion,
  isHigherOrSameVersion,
  isLowerOrSameVersion,
  isSameVersion,
  isStrictlyHigherVersion,
  isStrictlyLowerVersion
} from './versioning/predicates.js';
export { highestVersion, sortVersions, type SortDirection } from './versioning/collections.js';
