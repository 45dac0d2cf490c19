import { ExtractionLimits } from '../../../domain/value-objects/extraction-limits.vo';

/**
 * Extraction Limits Port (Driven Port)
 * Resolves the limits for one invocation from the configuration source.
 * Absent values fall back to documented defaults; unusable values raise
 * ConfigurationError.
 */
export interface ExtractionLimitsPort {
  resolve(): Promise<ExtractionLimits>;
}
