import { z } from 'zod';

export const extractionSourceSchema = z.enum(['vision', 'pattern']);
export type ExtractionSource = z.infer<typeof extractionSourceSchema>;

/** Canonical provenance order: sources are always listed in this order. */
export const EXTRACTION_SOURCES = extractionSourceSchema.options;

export const observationStatusSchema = z.enum([
    'normal',
    'low',
    'high',
    'unknown',
]);
export type ObservationStatus = z.infer<typeof observationStatusSchema>;

export const rangeSourceSchema = z.enum(['report', 'knowledge-base', 'none']);
export type RangeSource = z.infer<typeof rangeSourceSchema>;

export const rawCandidateSchema = z.object({
    source: extractionSourceSchema,
    rawName: z.string(),
    rawValue: z.string(),
    rawUnit: z.string(),
    rawRange: z.string().optional(),
    confidence: z.number().min(0).max(1).optional(),
});
export type RawCandidate = z.infer<typeof rawCandidateSchema>;

export const alternateValueSchema = z.object({
    source: extractionSourceSchema,
    value: z.number().finite(),
    unit: z.string(),
});
export type AlternateValue = z.infer<typeof alternateValueSchema>;

export const canonicalObservationSchema = z
    .object({
        analyte: z.string().trim().min(1),
        code: z.string().trim().min(1).optional(),
        recognized: z.boolean(),
        originalName: z.string().trim().min(1),
        value: z.number().finite(),
        unit: z.string(),
        referenceLow: z.number().finite().optional(),
        referenceHigh: z.number().finite().optional(),
        rangeSource: rangeSourceSchema,
        status: observationStatusSchema,
        sources: z.array(extractionSourceSchema).min(1),
        conflict: z.boolean(),
        alternates: z.array(alternateValueSchema),
        confidence: z.number().min(0).max(1).optional(),
        original: z
            .object({
                value: z.number().finite(),
                unit: z.string(),
            })
            .optional(),
    })
    .refine(
        value =>
            value.referenceLow === undefined ||
            value.referenceHigh === undefined ||
            value.referenceLow <= value.referenceHigh,
        { message: 'referenceLow must not exceed referenceHigh' },
    );
export type CanonicalObservation = z.infer<typeof canonicalObservationSchema>;

export const rejectionReasonSchema = z.enum([
    'empty-name',
    'non-numeric-value',
    'noise-name',
    'date-like-value',
    'non-positive-value',
    'implausible-magnitude',
]);
export type RejectionReason = z.infer<typeof rejectionReasonSchema>;

export const rejectedCandidateSchema = z.object({
    stage: z.enum(['normalize', 'filter']),
    source: extractionSourceSchema,
    name: z.string(),
    value: z.union([z.number(), z.string()]),
    reason: rejectionReasonSchema,
});
export type RejectedCandidate = z.infer<typeof rejectedCandidateSchema>;

export const pathwayOutcomeSchema = z.object({
    status: z.enum(['ok', 'failed', 'skipped']),
    candidates: z.number().int().nonnegative(),
    error: z.string().optional(),
});
export type PathwayOutcome = z.infer<typeof pathwayOutcomeSchema>;

export const reportSummarySchema = z.object({
    total: z.number().int().nonnegative(),
    normal: z.number().int().nonnegative(),
    low: z.number().int().nonnegative(),
    high: z.number().int().nonnegative(),
    unknown: z.number().int().nonnegative(),
    unrecognized: z.number().int().nonnegative(),
    conflicts: z.number().int().nonnegative(),
});
export type ReportSummary = z.infer<typeof reportSummarySchema>;

export const reportFileSchema = z.object({
    reportId: z.string().trim().min(1),
    sourceFile: z.string().trim().min(1),
    importedAt: z.string().datetime(),
    modelId: z.string().trim().min(1).optional(),
    pathways: z.object({
        vision: pathwayOutcomeSchema,
        pattern: pathwayOutcomeSchema,
    }),
    observations: z.array(canonicalObservationSchema),
    rejected: z.array(rejectedCandidateSchema),
    summary: reportSummarySchema,
});
export type ReportFile = z.infer<typeof reportFileSchema>;

const GROUPED_NUMBER_REGEX = /^[+-]?\d{1,3}(?:,\d{3})+(?:\.\d+)?$/;
const PLAIN_NUMBER_REGEX = /^[+-]?(?:\d+(?:\.\d+)?|\.\d+)$/;
const DECIMAL_COMMA_REGEX = /^[+-]?\d+,\d+$/;

const EXPONENT_NOTATION = /^(-?)(\d)(?:\.(\d+))?e([+-]\d+)$/;

/** Decimal rendering of a number, without the exponent form `String()` uses for very small or large values. */
export function formatPlainNumber(value: number): string {
    const text = String(value);
    const match = text.match(EXPONENT_NOTATION);
    if (!match) {
        return text;
    }

    const [, sign, integer, fraction = '', exponentText] = match;
    const exponent = Number(exponentText);
    const digits = integer + fraction;
    if (exponent < 0) {
        return `${sign}0.${'0'.repeat(-exponent - 1)}${digits}`;
    }
    return sign + digits.padEnd(exponent + 1, '0');
}

/**
 * Strict numeric token parser. Accepts `1,234.5` style thousands grouping and a single
 * decimal point; a lone decimal comma (`4,5`) is read as a decimal point. Anything else,
 * including comparators and trailing flags, yields undefined.
 */
export function parseNumericToken(raw: string): number | undefined {
    const value = raw.trim();
    if (!value) {
        return undefined;
    }

    let normalized: string | undefined;
    if (GROUPED_NUMBER_REGEX.test(value)) {
        normalized = value.replaceAll(',', '');
    } else if (PLAIN_NUMBER_REGEX.test(value)) {
        normalized = value;
    } else if (DECIMAL_COMMA_REGEX.test(value)) {
        normalized = value.replace(',', '.');
    }

    if (normalized === undefined) {
        return undefined;
    }
    const parsed = Number.parseFloat(normalized);
    return Number.isFinite(parsed) ? parsed : undefined;
}

const RANGE_NUMBER = '-?(?:\\d{1,3}(?:,\\d{3})+|\\d+)(?:[.,]\\d+)?';
const RANGE_PAIR_REGEX = new RegExp(`(${RANGE_NUMBER})\\s*(?:-|–|—|to)\\s*(${RANGE_NUMBER})`, 'i');
const RANGE_COMPARATOR_REGEX = new RegExp(`([<>≤≥]=?)\\s*(${RANGE_NUMBER})`);

export type ReferenceBounds = { low?: number; high?: number };

export function parseReferenceRangeBoundsFromText(text: string): ReferenceBounds | undefined {
    const trimmed = text.trim();
    if (!trimmed) {
        return undefined;
    }

    const pair = trimmed.match(RANGE_PAIR_REGEX);
    if (pair) {
        const low = parseNumericToken(pair[1]);
        const high = parseNumericToken(pair[2]);
        if (low === undefined && high === undefined) {
            return undefined;
        }
        return { low, high };
    }

    const comparator = trimmed.match(RANGE_COMPARATOR_REGEX);
    if (!comparator) {
        return undefined;
    }

    const value = parseNumericToken(comparator[2]);
    if (value === undefined) {
        return undefined;
    }

    if (comparator[1].includes('<') || comparator[1].includes('≤')) {
        return { high: value };
    }
    return { low: value };
}

export function collapseWhitespace(value: string): string {
    return value.replace(/\s+/g, ' ').trim();
}

export function slugifyForPath(value: string): string {
    const stripped = value
        .normalize('NFKD')
        .replace(/[\u0300-\u036f]/g, '')
        .toLowerCase()
        .replace(/[^a-z0-9]+/g, '-')
        .replace(/^-+|-+$/g, '');
    return stripped || 'unknown-report';
}

export function buildReportFileName(input: { date: string; sourceName: string }): string {
    return `report_${input.date}_${slugifyForPath(input.sourceName)}.json`;
}

export function buildReportS3Key(fileName: string, prefix: string): string {
    const normalizedPrefix = prefix.replace(/^\/+|\/+$/g, '');
    return normalizedPrefix ? `${normalizedPrefix}/${fileName}` : fileName;
}
