import type { ExtractionSource, RawCandidate } from './lab-schema.ts';

export type ReportDocument = {
    path: string;
    bytes: Uint8Array;
    mediaType: string;
    /** Text recovered by an external OCR pass, when one was supplied. */
    ocrText?: string;
};

export type ExtractionResult = {
    candidates: RawCandidate[];
    /** Model that produced the candidates, for pathways backed by one. */
    modelId?: string;
};

/** Both extraction pathways produce the same candidate shape behind this interface. */
export interface CandidateExtractor {
    readonly source: ExtractionSource;
    extract(document: ReportDocument): Promise<ExtractionResult>;
}
