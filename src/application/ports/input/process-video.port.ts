import { ProcessingRequest } from '../../../domain/value-objects/processing-request.vo';
import { ExtractionLimits } from '../../../domain/value-objects/extraction-limits.vo';

/**
 * Process Video Port (Driving Port / Use Case Interface)
 * Download, extract, package, upload and notify for one request.
 *
 * Resolves with nothing: the outcome is only observable through the single
 * notification. Rejects with the original stage error after a FAILURE
 * notification has been attempted.
 */
export interface ProcessVideoPort {
  execute(request: ProcessingRequest, limits: ExtractionLimits): Promise<void>;
}
