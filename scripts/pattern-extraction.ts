import type { CandidateExtractor, ReportDocument } from './candidate-extractor.ts';
import { isNoiseName } from './false-positive-filter.ts';
import { normalizeAnalyteKey, resolveAnalyte, type AnalyteEntry, type KnowledgeBase } from './knowledge-base.ts';
import type { RawCandidate } from './lab-schema.ts';
import { extractPdfText } from './pdf-text.ts';

const NUMBER = '(?:\\d{1,3}(?:,\\d{3})+|\\d+)(?:[.,]\\d+)?';

/**
 * `<name> <value> [unit] [(low - high)]`, one result per line. The name is lazy so that the
 * first number on the line becomes the value.
 */
const RESULT_LINE_PATTERN = new RegExp(
    [
        '^([A-Za-zÄÖÜäöüß][A-Za-zÄÖÜäöüß0-9 ,/%().+:\'-]{0,80}?)',
        `\\s+([<>]?${NUMBER}|[<>]?\\.\\d+)`,
        '(?:\\s*([A-Za-zµμ%/][A-Za-z0-9µμ/%.^*-]{0,20}))?',
        `(?:\\s+[(\\[]?\\s*(${NUMBER})\\s*[-–]\\s*(${NUMBER})\\s*[)\\]]?)?`,
    ].join(''),
);

/** Splits OCR output on form feeds and `--- PAGE n ---` style separators. */
export function splitReportPages(text: string): string[] {
    return text
        .split(/\f|^-{2,}\s*page\s+\d+\s*-{2,}$/gim)
        .map(page => page.trim())
        .filter(Boolean);
}

export function parseResultLine(line: string): Omit<RawCandidate, 'source'> | undefined {
    const match = line.replace(/\s+/g, ' ').trim().match(RESULT_LINE_PATTERN);
    if (!match) {
        return undefined;
    }

    const rawName = match[1].trim();
    if (!rawName) {
        return undefined;
    }

    const [, , rawValue, unit, low, high] = match;
    return {
        rawName,
        rawValue,
        rawUnit: unit?.trim() ?? '',
        ...(low !== undefined && high !== undefined ? { rawRange: `${low} - ${high}` } : {}),
    };
}

const MIN_EMBEDDED_NAME_LENGTH = 3;

function isWordBoundary(text: string, index: number): boolean {
    return index < 0 || index >= text.length || !/[\p{L}\p{N}]/u.test(text[index]);
}

/**
 * Finds the longest known name, code or alias that appears as a whole word inside a longer label,
 * e.g. `Serum Creatinine, Blood` or `Hemoglobin (Hb)`.
 */
export function findKnownAnalyteInLabel(label: string, knowledgeBase: KnowledgeBase): AnalyteEntry | undefined {
    const haystack = normalizeAnalyteKey(label);
    let best: { key: string; entry: AnalyteEntry } | undefined;

    for (const [key, entry] of knowledgeBase.lookup) {
        if (key.length < MIN_EMBEDDED_NAME_LENGTH || (best && key.length <= best.key.length)) {
            continue;
        }
        let index = haystack.indexOf(key);
        while (index !== -1) {
            if (isWordBoundary(haystack, index - 1) && isWordBoundary(haystack, index + key.length)) {
                best = { key, entry };
                break;
            }
            index = haystack.indexOf(key, index + 1);
        }
    }

    return best?.entry;
}

function resolveLabel(rawName: string, knowledgeBase: KnowledgeBase | undefined): string {
    if (!knowledgeBase || resolveAnalyte(knowledgeBase, rawName) || isNoiseName(rawName, knowledgeBase)) {
        return rawName;
    }
    return findKnownAnalyteInLabel(rawName, knowledgeBase)?.name ?? rawName;
}

/**
 * One candidate per matching line. Headers and demographics that look like results are kept here.
 * With a knowledge base, labels that only embed a known name are reported under that name.
 */
export function extractPatternCandidates(pageTexts: string[], knowledgeBase?: KnowledgeBase): RawCandidate[] {
    const candidates: RawCandidate[] = [];
    for (const pageText of pageTexts) {
        const lines = pageText.split('\n').map(line => line.trim()).filter(Boolean);
        for (const line of lines) {
            const parsed = parseResultLine(line);
            if (parsed) {
                candidates.push({ source: 'pattern', ...parsed, rawName: resolveLabel(parsed.rawName, knowledgeBase) });
            }
        }
    }
    return candidates;
}

export async function recoverReportText(document: ReportDocument): Promise<string[]> {
    if (document.ocrText !== undefined) {
        return splitReportPages(document.ocrText);
    }
    if (document.mediaType === 'application/pdf') {
        const extracted = await extractPdfText(document.bytes);
        return extracted.pageTexts;
    }
    // Images carry no text layer; without external OCR output there is nothing to scan.
    return [];
}

export function createPatternExtractor(knowledgeBase?: KnowledgeBase): CandidateExtractor {
    return {
        source: 'pattern',
        async extract(document) {
            const pageTexts = await recoverReportText(document);
            return { candidates: extractPatternCandidates(pageTexts, knowledgeBase) };
        },
    };
}
