import type { ReferenceToVerify, VerificationResult, VerificationStatus } from '../types/index.js';
import { AllSourcesUnavailableError } from '../utils/errors.js';
import type { SourceHealth } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import type { Verifier } from './verifier.js';

const logger = getLogger();

export type VerificationSummary = Record<VerificationStatus, number> & { total: number };

/**
 * Verify references one after another, in input order.
 *
 * A reference whose verification throws is reported NOT_FOUND and the run
 * continues. When `health` shows that no request of the run reached any
 * source, the results mean nothing and the run fails instead.
 *
 * @throws AllSourcesUnavailableError
 */
export async function verifyReferences(
    references: readonly ReferenceToVerify[],
    verifier: Pick<Verifier, 'verify'>,
    health?: SourceHealth,
    onProgress?: (done: number, total: number, result: VerificationResult) => void
): Promise<VerificationResult[]> {
    const results: VerificationResult[] = [];

    for (const [index, reference] of references.entries()) {
        let result: VerificationResult;
        try {
            result = await verifier.verify(reference);
        } catch (error) {
            logger.error({ index, label: reference.label, error }, 'Verification failed for reference');
            result = {
                reference,
                status: 'NOT_FOUND',
                matched_record: null,
                field_mismatches: [],
                field_checks: [],
                sources_used: [],
                attempts: [],
            };
        }

        results.push(result);
        onProgress?.(index + 1, references.length, result);
    }

    if (health?.allSourcesUnavailable()) {
        throw new AllSourcesUnavailableError(health.getUnavailableCount());
    }

    return results;
}

/**
 * Count results per status.
 */
export function summarizeResults(results: readonly VerificationResult[]): VerificationSummary {
    const summary: VerificationSummary = {
        total: results.length,
        VERIFIED: 0,
        ERRORS_FOUND: 0,
        NOT_FOUND: 0,
        RETRACTED: 0,
    };
    for (const result of results) {
        summary[result.status] += 1;
    }
    return summary;
}
