import _ from 'lodash';

import {
    resolveAnalyte,
    resolveUnit,
    type AnalyteEntry,
    type KnowledgeBase,
} from './knowledge-base.ts';
import {
    collapseWhitespace,
    parseNumericToken,
    parseReferenceRangeBoundsFromText,
    type CanonicalObservation,
    type RangeSource,
    type RawCandidate,
    type ReferenceBounds,
    type RejectedCandidate,
} from './lab-schema.ts';

const CONVERTED_VALUE_PRECISION = 4;

type NormalizeOutcome =
    | { observation: CanonicalObservation }
    | { rejection: RejectedCandidate };

type ResolvedRange = {
    referenceLow?: number;
    referenceHigh?: number;
    rangeSource: RangeSource;
};

function convertValue(value: number, factor: number): number {
    return factor === 1 ? value : _.round(value * factor, CONVERTED_VALUE_PRECISION);
}

/**
 * Parses a range printed on the report. A one-sided `<x` range on a quantity that cannot go
 * below zero reads as `0 - x`. Inverted ranges count as unparseable.
 */
export function parseReportRange(rawRange: string, mustBePositive: boolean): ReferenceBounds | undefined {
    const bounds = parseReferenceRangeBoundsFromText(rawRange);
    if (!bounds) {
        return undefined;
    }

    const low = bounds.low ?? (mustBePositive && bounds.high !== undefined ? 0 : undefined);
    const high = bounds.high;
    if (low !== undefined && high !== undefined && low > high) {
        return undefined;
    }
    return { low, high };
}

function toResolvedRange(bounds: ReferenceBounds, rangeSource: RangeSource): ResolvedRange {
    return {
        ...(bounds.low !== undefined ? { referenceLow: bounds.low } : {}),
        ...(bounds.high !== undefined ? { referenceHigh: bounds.high } : {}),
        rangeSource,
    };
}

function resolveRange({
    rawRange,
    entry,
    factor,
    knowledgeBaseRangeApplies,
}: {
    rawRange: string | undefined;
    entry: AnalyteEntry | undefined;
    factor: number;
    knowledgeBaseRangeApplies: boolean;
}): ResolvedRange {
    const mustBePositive = entry ? !entry.allowNonPositive : false;
    const reported = rawRange ? parseReportRange(rawRange, mustBePositive) : undefined;
    if (reported) {
        return toResolvedRange(
            {
                low: reported.low === undefined ? undefined : convertValue(reported.low, factor),
                high: reported.high === undefined ? undefined : convertValue(reported.high, factor),
            },
            'report',
        );
    }

    if (entry && knowledgeBaseRangeApplies && (entry.low !== undefined || entry.high !== undefined)) {
        return toResolvedRange({ low: entry.low, high: entry.high }, 'knowledge-base');
    }
    return { rangeSource: 'none' };
}

function normalizeOne(candidate: RawCandidate, knowledgeBase: KnowledgeBase): NormalizeOutcome {
    const originalName = collapseWhitespace(candidate.rawName);
    const reject = (reason: RejectedCandidate['reason']): NormalizeOutcome => ({
        rejection: {
            stage: 'normalize',
            source: candidate.source,
            name: originalName,
            value: candidate.rawValue,
            reason,
        },
    });

    if (!originalName) {
        return reject('empty-name');
    }

    const reportedValue = parseNumericToken(candidate.rawValue);
    if (reportedValue === undefined) {
        return reject('non-numeric-value');
    }

    const rawUnit = collapseWhitespace(candidate.rawUnit);
    const provenance = {
        originalName,
        status: 'unknown' as const,
        sources: [candidate.source],
        conflict: false,
        alternates: [],
        ...(candidate.confidence !== undefined ? { confidence: candidate.confidence } : {}),
    };

    const entry = resolveAnalyte(knowledgeBase, originalName);
    if (!entry) {
        return {
            observation: {
                ...provenance,
                analyte: originalName,
                recognized: false,
                value: reportedValue,
                unit: rawUnit,
                ...resolveRange({
                    rawRange: candidate.rawRange,
                    entry: undefined,
                    factor: 1,
                    knowledgeBaseRangeApplies: false,
                }),
            },
        };
    }

    // An empty unit inherits the canonical one; an unknown unit keeps the reported value as-is.
    const unitResolution = rawUnit ? resolveUnit(entry, rawUnit) : { unit: entry.unit, factor: 1 };
    const factor = unitResolution?.factor ?? 1;
    const value = convertValue(reportedValue, factor);

    return {
        observation: {
            ...provenance,
            analyte: entry.name,
            ...(entry.code ? { code: entry.code } : {}),
            recognized: true,
            value,
            unit: unitResolution?.unit ?? rawUnit,
            ...resolveRange({
                rawRange: candidate.rawRange,
                entry,
                factor,
                knowledgeBaseRangeApplies: unitResolution !== undefined,
            }),
            ...(factor !== 1 ? { original: { value: reportedValue, unit: rawUnit } } : {}),
        },
    };
}

export function normalizeCandidate(
    candidate: RawCandidate,
    knowledgeBase: KnowledgeBase,
): CanonicalObservation | undefined {
    const outcome = normalizeOne(candidate, knowledgeBase);
    return 'observation' in outcome ? outcome.observation : undefined;
}

export function normalizeCandidates(
    candidates: RawCandidate[],
    knowledgeBase: KnowledgeBase,
): { observations: CanonicalObservation[]; rejected: RejectedCandidate[] } {
    const observations: CanonicalObservation[] = [];
    const rejected: RejectedCandidate[] = [];
    for (const candidate of candidates) {
        const outcome = normalizeOne(candidate, knowledgeBase);
        if ('observation' in outcome) {
            observations.push(outcome.observation);
        } else {
            rejected.push(outcome.rejection);
        }
    }
    return { observations, rejected };
}
