import { generateObject, generateText, type LanguageModel, type ModelMessage } from 'ai';
import { z } from 'zod';

import type { CandidateExtractor, ReportDocument } from './candidate-extractor.ts';
import { collapseWhitespace, formatPlainNumber, type RawCandidate } from './lab-schema.ts';

/** Anything that hands out a language model by id; an OpenRouter provider instance fits. */
export type ModelProvider = (modelId: string) => LanguageModel;

const VISION_MAX_OUTPUT_TOKENS = 4_000;
const VISION_SYSTEM_PROMPT = 'You are a precise medical lab data extraction engine.';

const visionResultSchema = z.object({
    name: z.string().trim().min(1),
    value: z.union([z.number().finite(), z.string()]),
    unit: z.string().nullish(),
    referenceRange: z.string().nullish(),
    confidence: z.number().min(0).max(1).nullish(),
});

export const visionBatchSchema = z.object({
    results: z.array(visionResultSchema),
});
export type VisionBatch = z.infer<typeof visionBatchSchema>;

export function buildVisionPrompt(sourcePath: string): string {
    return [
        `Source file: ${sourcePath}`,
        '',
        'Extract every laboratory test result from the attached blood-test report.',
        'For each result return name, value, unit, referenceRange and confidence (0 to 1).',
        'Copy values, units and reference ranges exactly as printed; do not convert units.',
        'Skip patient details, dates, page headers, report identifiers and doctor or lab contact details.',
        'If the report contains no results, return an empty results array.',
    ].join('\n');
}

function buildVisionMessages(document: ReportDocument, extraInstructions: string[] = []): ModelMessage[] {
    return [{
        role: 'user',
        content: [
            { type: 'text', text: [buildVisionPrompt(document.path), ...extraInstructions].join('\n') },
            { type: 'file', data: document.bytes, mediaType: document.mediaType },
        ],
    }];
}

export function toVisionCandidates(batch: VisionBatch): RawCandidate[] {
    return batch.results.map((result): RawCandidate => {
        const rawRange = result.referenceRange?.trim();
        return {
            source: 'vision',
            rawName: result.name,
            rawValue: typeof result.value === 'number' ? formatPlainNumber(result.value) : result.value.trim(),
            rawUnit: result.unit?.trim() ?? '',
            ...(rawRange ? { rawRange } : {}),
            ...(result.confidence !== undefined && result.confidence !== null
                ? { confidence: result.confidence }
                : {}),
        };
    });
}

export function parseJsonFromText(text: string): unknown {
    const trimmed = text.trim();
    if (!trimmed) {
        throw new Error('Model returned empty text');
    }

    const fenced = trimmed.match(/```(?:json)?\s*([\s\S]*?)\s*```/i);
    const candidates = fenced ? [fenced[1], trimmed] : [trimmed];

    const attempts = candidates.flatMap(candidate => {
        const slices = [candidate];
        for (const [open, close] of [['{', '}'], ['[', ']']]) {
            const start = candidate.indexOf(open);
            const end = candidate.lastIndexOf(close);
            if (start >= 0 && end > start) {
                slices.push(candidate.slice(start, end + 1));
            }
        }
        return slices;
    });

    for (const attempt of attempts) {
        try {
            return JSON.parse(attempt);
        } catch {
            // next slice
        }
    }

    throw new Error(`Could not parse JSON from model output: ${trimmed.slice(0, 300)}`);
}

const TEXT_VALUE_PATTERN = /^(-?(?:\d{1,3}(?:,\d{3})+|\d+)(?:[.,]\d+)?)\s*([^()]*?)\s*(?:\(([^)]*)\))?\s*$/;

/** Reads free-form `Name: value unit (low-high)` lines, one result per line. */
export function parseVisionTextLines(text: string): RawCandidate[] {
    const candidates: RawCandidate[] = [];
    for (const rawLine of text.split('\n')) {
        const line = rawLine.trim();
        const separator = line.indexOf(':');
        if (separator <= 0) continue;

        const rawName = line
            .slice(0, separator)
            .replace(/[*_]/g, ' ')
            .replace(/^\s*(?:[-•]|\d+[.)])\s*/, '');
        const valuePart = line.slice(separator + 1).replace(/[*_]/g, ' ').trim();
        if (!/\p{L}/u.test(rawName) || !valuePart) continue;

        const match = valuePart.match(TEXT_VALUE_PATTERN);
        if (!match) {
            candidates.push({
                source: 'vision',
                rawName: collapseWhitespace(rawName),
                rawValue: collapseWhitespace(valuePart.replace(/\([^)]*\)/g, '')),
                rawUnit: '',
            });
            continue;
        }

        const [, rawValue, unit, range] = match;
        const rawRange = range?.trim();
        candidates.push({
            source: 'vision',
            rawName: collapseWhitespace(rawName),
            rawValue,
            rawUnit: collapseWhitespace(unit ?? ''),
            ...(rawRange ? { rawRange } : {}),
        });
    }
    return candidates;
}

/** JSON first (an object with `results`, or a bare array of results), then line format. */
export function parseVisionModelText(text: string): RawCandidate[] {
    let json: unknown;
    try {
        json = parseJsonFromText(text);
    } catch {
        return parseVisionTextLines(text);
    }

    const batch = visionBatchSchema.safeParse(Array.isArray(json) ? { results: json } : json);
    return batch.success ? toVisionCandidates(batch.data) : parseVisionTextLines(text);
}

export async function extractWithModelFallback({
    provider,
    modelIds,
    document,
}: {
    provider: ModelProvider;
    modelIds: string[];
    document: ReportDocument;
}): Promise<{ candidates: RawCandidate[]; modelId: string }> {
    let lastError: unknown = null;

    for (const modelId of modelIds) {
        try {
            const result = await generateObject({
                model: provider(modelId),
                schema: visionBatchSchema,
                system: VISION_SYSTEM_PROMPT,
                messages: buildVisionMessages(document),
                temperature: 0,
                maxRetries: 2,
                maxOutputTokens: VISION_MAX_OUTPUT_TOKENS,
            });

            return {
                candidates: toVisionCandidates(result.object),
                modelId,
            };
        } catch (error) {
            try {
                const textResult = await generateText({
                    model: provider(modelId),
                    system: VISION_SYSTEM_PROMPT,
                    messages: buildVisionMessages(document, [
                        '',
                        'Return only valid JSON of the form {"results": [...]}.',
                        'Do not wrap JSON in markdown.',
                    ]),
                    temperature: 0,
                    maxRetries: 1,
                    maxOutputTokens: VISION_MAX_OUTPUT_TOKENS,
                });
                return {
                    candidates: parseVisionModelText(textResult.text),
                    modelId,
                };
            } catch (textFallbackError) {
                lastError = `${String(error)} | Text fallback failed: ${String(textFallbackError)}`;
            }
        }
    }

    throw new Error(
        `All model attempts failed for ${document.path}. Attempted: ${modelIds.join(', ')}. Last error: ${String(lastError)}`,
    );
}

export function createVisionExtractor({
    provider,
    modelIds,
}: {
    provider: ModelProvider;
    modelIds: string[];
}): CandidateExtractor {
    return {
        source: 'vision',
        async extract(document) {
            return extractWithModelFallback({ provider, modelIds, document });
        },
    };
}
