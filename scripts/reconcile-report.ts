import { z } from 'zod';

import { normalizeCandidates } from './candidate-normalizer.ts';
import { DEFAULT_AGREEMENT_TOLERANCE, mergeObservations } from './cross-source-merger.ts';
import { DEFAULT_MAGNITUDE_BOUND_FACTOR, filterFalsePositives } from './false-positive-filter.ts';
import type { KnowledgeBase } from './knowledge-base.ts';
import {
    EXTRACTION_SOURCES,
    type CanonicalObservation,
    type ExtractionSource,
    type RawCandidate,
    type RejectedCandidate,
    type ReportSummary,
} from './lab-schema.ts';
import { classifyObservations } from './status-classifier.ts';

export const reconcileOptionsSchema = z.object({
    agreementTolerance: z.number().min(0).lt(1).default(DEFAULT_AGREEMENT_TOLERANCE),
    magnitudeBoundFactor: z.number().gt(1).finite().default(DEFAULT_MAGNITUDE_BOUND_FACTOR),
});

export type ReconcileOptions = z.infer<typeof reconcileOptionsSchema>;
export type ReconcileOptionsInput = z.input<typeof reconcileOptionsSchema>;

/** Candidate lists keyed by the pathway that produced them; a missing list counts as empty. */
export type PathwayCandidates = Partial<Record<ExtractionSource, RawCandidate[]>>;

export type ReconcileResult = {
    observations: CanonicalObservation[];
    rejected: RejectedCandidate[];
};

export function reconcileReport(
    candidates: PathwayCandidates,
    knowledgeBase: KnowledgeBase,
    options: ReconcileOptionsInput = {},
): ReconcileResult {
    const { agreementTolerance, magnitudeBoundFactor } = reconcileOptionsSchema.parse(options);
    const rejected: RejectedCandidate[] = [];
    const filteredLists: CanonicalObservation[][] = [];

    for (const source of EXTRACTION_SOURCES) {
        const normalized = normalizeCandidates(candidates[source] ?? [], knowledgeBase);
        const filtered = filterFalsePositives(normalized.observations, knowledgeBase, {
            magnitudeBoundFactor,
        });
        rejected.push(...normalized.rejected, ...filtered.rejected);
        filteredLists.push(filtered.kept);
    }

    const merged = mergeObservations(filteredLists, { agreementTolerance });
    return {
        observations: classifyObservations(merged),
        rejected,
    };
}

export function summarizeObservations(observations: CanonicalObservation[]): ReportSummary {
    const summary: ReportSummary = {
        total: observations.length,
        normal: 0,
        low: 0,
        high: 0,
        unknown: 0,
        unrecognized: 0,
        conflicts: 0,
    };
    for (const observation of observations) {
        summary[observation.status] += 1;
        if (!observation.recognized) summary.unrecognized += 1;
        if (observation.conflict) summary.conflicts += 1;
    }
    return summary;
}
