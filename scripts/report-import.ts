import fs from 'fs';
import path from 'path';

import { PutObjectCommand, S3Client } from '@aws-sdk/client-s3';
import { createOpenRouter } from '@openrouter/ai-sdk-provider';
import chalk from 'chalk';
import { formatDate } from 'date-fns';
import _ from 'lodash';

import type { CandidateExtractor, ReportDocument } from './candidate-extractor.ts';
import { createScript, getTimer, isMainModule, logStep, style } from './createScript.ts';
import { loadKnowledgeBase, type KnowledgeBase } from './knowledge-base.ts';
import {
    buildReportFileName,
    buildReportS3Key,
    reportFileSchema,
    slugifyForPath,
    type CanonicalObservation,
    type ExtractionSource,
    type PathwayOutcome,
    type ReportFile,
} from './lab-schema.ts';
import { createPatternExtractor } from './pattern-extraction.ts';
import { assertPdfSignature } from './pdf-text.ts';
import { PROJECT_DATA_DIR, PROJECT_KNOWLEDGE_BASE_PATH, PROJECT_TO_IMPORT_DIR } from './project-paths.ts';
import {
    reconcileOptionsSchema,
    reconcileReport,
    summarizeObservations,
    type PathwayCandidates,
    type ReconcileOptionsInput,
    type ReconcileResult,
} from './reconcile-report.ts';
import { createVisionExtractor } from './vision-extraction.ts';

const existingReportSourceSchema = reportFileSchema.pick({ sourceFile: true });

const DEFAULT_S3_PREFIX = 'lab-reports';
const DEFAULT_MODEL_IDS = ['google/gemini-3-flash-preview'];

const REPORT_MEDIA_TYPES: Record<string, string> = {
    '.pdf': 'application/pdf',
    '.png': 'image/png',
    '.jpg': 'image/jpeg',
    '.jpeg': 'image/jpeg',
    '.webp': 'image/webp',
};

type CliOptions = {
    importAll: boolean;
    inputPath: string | null;
    ocrTextPath: string | null;
    continueOnError: boolean;
    skipUpload: boolean;
    skipVision: boolean;
    modelIds: string[];
    reconcile: ReconcileOptionsInput;
};

type ImportResult = {
    outputPath: string;
    s3Key: string | null;
    report: ReportFile;
};

type PathwayRun = {
    candidates: PathwayCandidates;
    pathways: ReportFile['pathways'];
    modelId: string | undefined;
};

const HELP_TEXT = [
    'Usage:',
    '  tsx scripts/report-import.ts <path-to-report> [--ocr-text <path>] [options]',
    '  tsx scripts/report-import.ts --all [--continue-on-error] [options]',
    '',
    'Flags:',
    '  --all                 Import every report (.pdf, .png, .jpg, .jpeg, .webp) from data/to-import',
    '  --continue-on-error   Continue processing other files when --all is used',
    '  --ocr-text <path>     Use this OCR text for the pattern pathway instead of the PDF text layer',
    '  --skip-vision         Do not call the vision model (pattern pathway only)',
    '  --skip-upload         Skip S3 upload (useful for local validation)',
    '  --model <id>          Override model id (can be repeated)',
    '  --tolerance <x>       Relative tolerance under which pathway values agree (default 0.01)',
    '  --bound-factor <x>    Plausibility bound as a multiple of the reference high (default 1000)',
].join('\n');

function readFlagValue(argv: string[], index: number, flag: string): string {
    const token = argv[index];
    if (token.startsWith(`${flag}=`)) {
        const value = token.slice(flag.length + 1).trim();
        if (!value) {
            throw new Error(`Missing value in ${token}\n\n${HELP_TEXT}`);
        }
        return value;
    }
    const value = argv[index + 1];
    if (!value || value.startsWith('--')) {
        throw new Error(`Missing value after ${flag}\n\n${HELP_TEXT}`);
    }
    return value;
}

function parseNumberFlag(value: string, flag: string): number {
    const parsed = Number(value);
    if (!Number.isFinite(parsed)) {
        throw new Error(`Invalid number for ${flag}: ${value}\n\n${HELP_TEXT}`);
    }
    return parsed;
}

const VALUE_FLAGS = ['--model', '--ocr-text', '--tolerance', '--bound-factor'] as const;
type ValueFlag = (typeof VALUE_FLAGS)[number];

function matchValueFlag(token: string): ValueFlag | undefined {
    return VALUE_FLAGS.find(flag => token === flag || token.startsWith(`${flag}=`));
}

function parseCliOptions(argv: string[]): CliOptions {
    let importAll = false;
    let continueOnError = false;
    let skipUpload = false;
    let skipVision = false;
    let ocrTextPath: string | null = null;
    const modelIds: string[] = [];
    const reconcile: ReconcileOptionsInput = {};
    const positional: string[] = [];

    for (let index = 0; index < argv.length; index++) {
        const token = argv[index];
        if (token === '--all') {
            importAll = true;
            continue;
        }
        if (token === '--continue-on-error') {
            continueOnError = true;
            continue;
        }
        if (token === '--skip-upload') {
            skipUpload = true;
            continue;
        }
        if (token === '--skip-vision') {
            skipVision = true;
            continue;
        }

        const valueFlag = matchValueFlag(token);
        if (valueFlag) {
            const value = readFlagValue(argv, index, valueFlag);
            if (!token.includes('=')) index++;

            if (valueFlag === '--model') modelIds.push(value);
            if (valueFlag === '--ocr-text') ocrTextPath = value;
            if (valueFlag === '--tolerance') reconcile.agreementTolerance = parseNumberFlag(value, valueFlag);
            if (valueFlag === '--bound-factor') reconcile.magnitudeBoundFactor = parseNumberFlag(value, valueFlag);
            continue;
        }

        if (token.startsWith('--')) {
            throw new Error(`Unknown flag: ${token}\n\n${HELP_TEXT}`);
        }
        positional.push(token);
    }

    if (importAll && positional.length > 0) {
        throw new Error(`Do not pass a file path when using --all\n\n${HELP_TEXT}`);
    }

    if (!importAll && positional.length !== 1) {
        throw new Error(`Expected exactly one report path or --all\n\n${HELP_TEXT}`);
    }

    if (!importAll && continueOnError) {
        throw new Error(`--continue-on-error can only be used together with --all\n\n${HELP_TEXT}`);
    }

    if (importAll && ocrTextPath) {
        throw new Error(`--ocr-text can only be used with a single report\n\n${HELP_TEXT}`);
    }

    if (skipVision && modelIds.length > 0) {
        throw new Error(`--model has no effect together with --skip-vision\n\n${HELP_TEXT}`);
    }

    const checkedReconcile = reconcileOptionsSchema.safeParse(reconcile);
    if (!checkedReconcile.success) {
        const issues = checkedReconcile.error.issues
            .map(issue => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new Error(`Invalid reconciliation options: ${issues}\n\n${HELP_TEXT}`);
    }

    return {
        importAll,
        inputPath: importAll ? null : positional[0],
        ocrTextPath,
        continueOnError,
        skipUpload,
        skipVision,
        modelIds,
        reconcile,
    };
}

function requireEnv(name: string): string {
    const value = process.env[name]?.trim();
    if (!value) {
        throw new Error(`Missing required environment variable: ${name}`);
    }
    return value;
}

function resolveModelIds(cliModelIds: string[]): string[] {
    const normalized = _.uniq(cliModelIds.map(modelId => modelId.trim()).filter(Boolean));
    return normalized.length > 0 ? normalized : DEFAULT_MODEL_IDS;
}

function detectReportMediaType(filePath: string): string | undefined {
    return REPORT_MEDIA_TYPES[path.extname(filePath).toLowerCase()];
}

function resolveInputFiles(options: CliOptions, importDirectory = PROJECT_TO_IMPORT_DIR): string[] {
    if (options.importAll) {
        if (!fs.existsSync(importDirectory)) {
            throw new Error(`Import directory does not exist: ${importDirectory}`);
        }
        return fs
            .readdirSync(importDirectory, { withFileTypes: true })
            .filter(entry => entry.isFile() && detectReportMediaType(entry.name) !== undefined)
            .map(entry => path.join(importDirectory, entry.name))
            .sort((left, right) => left.localeCompare(right));
    }

    if (!options.inputPath) {
        throw new Error(`Missing input report path\n\n${HELP_TEXT}`);
    }

    const resolvedPath = path.resolve(process.cwd(), options.inputPath);
    if (!fs.existsSync(resolvedPath)) {
        throw new Error(`Input file does not exist: ${resolvedPath}`);
    }
    if (!detectReportMediaType(resolvedPath)) {
        throw new Error(`Input file must be a PDF or an image (.png, .jpg, .jpeg, .webp): ${resolvedPath}`);
    }
    if (!fs.statSync(resolvedPath).isFile()) {
        throw new Error(`Input path is not a file: ${resolvedPath}`);
    }
    return [resolvedPath];
}

function readReportDocument(reportPath: string, ocrTextPath: string | null): ReportDocument {
    const mediaType = detectReportMediaType(reportPath);
    if (!mediaType) {
        throw new Error(`Unsupported report type: ${reportPath}`);
    }

    const bytes = new Uint8Array(fs.readFileSync(reportPath));
    if (mediaType === 'application/pdf') {
        assertPdfSignature(bytes, reportPath);
    }

    const document: ReportDocument = { path: reportPath, bytes, mediaType };
    if (ocrTextPath) {
        document.ocrText = fs.readFileSync(path.resolve(process.cwd(), ocrTextPath), 'utf8');
    }
    return document;
}

function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Runs every pathway concurrently. A pathway that throws contributes no candidates and is
 * recorded as failed; a pathway without an extractor is recorded as skipped.
 */
async function runPathways({
    document,
    extractors,
}: {
    document: ReportDocument;
    extractors: CandidateExtractor[];
}): Promise<PathwayRun> {
    const settled = await Promise.allSettled(extractors.map(extractor => extractor.extract(document)));
    const candidates: PathwayCandidates = {};
    const pathways: Record<ExtractionSource, PathwayOutcome> = {
        vision: { status: 'skipped', candidates: 0 },
        pattern: { status: 'skipped', candidates: 0 },
    };
    let modelId: string | undefined;

    settled.forEach((outcome, index) => {
        const { source } = extractors[index];
        if (outcome.status === 'rejected') {
            pathways[source] = { status: 'failed', candidates: 0, error: describeError(outcome.reason) };
            return;
        }
        candidates[source] = outcome.value.candidates;
        pathways[source] = { status: 'ok', candidates: outcome.value.candidates.length };
        modelId ??= outcome.value.modelId;
    });

    return { candidates, pathways, modelId };
}

function buildReportFile({
    sourcePath,
    importedAt,
    result,
    run,
}: {
    sourcePath: string;
    importedAt: Date;
    result: ReconcileResult;
    run: PathwayRun;
}): ReportFile {
    const sourceName = path.basename(sourcePath, path.extname(sourcePath));
    return reportFileSchema.parse({
        reportId: `${formatDate(importedAt, 'yyyy-MM-dd')}_${slugifyForPath(sourceName)}`,
        sourceFile: sourcePath,
        importedAt: importedAt.toISOString(),
        ...(run.modelId ? { modelId: run.modelId } : {}),
        pathways: run.pathways,
        observations: result.observations,
        rejected: result.rejected,
        summary: summarizeObservations(result.observations),
    });
}

function resolveOutputFileName({
    report,
    outputDirectory,
}: {
    report: ReportFile;
    outputDirectory: string;
}): string {
    const baseFileName = buildReportFileName({
        date: formatDate(new Date(report.importedAt), 'yyyy-MM-dd'),
        sourceName: path.basename(report.sourceFile, path.extname(report.sourceFile)),
    });

    for (let attempt = 1; ; attempt++) {
        const fileName = attempt === 1 ? baseFileName : baseFileName.replace(/\.json$/i, `_${attempt}.json`);
        const outputPath = path.join(outputDirectory, fileName);
        if (!fs.existsSync(outputPath)) {
            return fileName;
        }

        let existing: unknown;
        try {
            existing = JSON.parse(fs.readFileSync(outputPath, 'utf8'));
        } catch {
            // a malformed file is left untouched; try the next name
            continue;
        }
        const parsed = existingReportSourceSchema.safeParse(existing);
        if (parsed.success && parsed.data.sourceFile === report.sourceFile) {
            return fileName;
        }
    }
}

function formatReferenceRange(observation: Pick<CanonicalObservation, 'referenceLow' | 'referenceHigh'>): string {
    const { referenceLow, referenceHigh } = observation;
    if (referenceLow !== undefined && referenceHigh !== undefined) return `${referenceLow} - ${referenceHigh}`;
    if (referenceLow !== undefined) return `>= ${referenceLow}`;
    if (referenceHigh !== undefined) return `<= ${referenceHigh}`;
    return 'n/a';
}

function formatObservationLine(observation: CanonicalObservation): string {
    const unit = observation.unit ? ` ${observation.unit}` : '';
    return `${observation.analyte}: ${observation.value}${unit} (Reference: ${formatReferenceRange(observation)})`;
}

function printReportSummary(report: ReportFile): void {
    const { summary } = report;
    console.group(style.header(report.reportId));
    console.info(
        [
            style.number(summary.total, 'observations'),
            style.number(summary.normal, 'normal'),
            style.number(summary.low + summary.high, 'abnormal'),
            style.number(summary.unknown, 'unknown'),
            style.number(summary.conflicts, 'conflicts'),
        ]
            .filter(Boolean)
            .join('  '),
    );
    console.info(
        style.label('pathways', `vision=${report.pathways.vision.status} pattern=${report.pathways.pattern.status}`),
    );

    for (const observation of report.observations) {
        if (observation.status === 'low' || observation.status === 'high') {
            console.info(chalk.red(observation.status.toUpperCase().padEnd(5)), formatObservationLine(observation));
        }
    }
    for (const observation of report.observations.filter(item => item.conflict)) {
        const alternates = observation.alternates
            .map(alternate => `${alternate.source} read ${alternate.value} ${alternate.unit}`.trim())
            .join(', ');
        console.info(chalk.yellow('CONFLICT'), `${observation.analyte}: kept ${observation.value}; ${alternates}`);
    }

    const rejectedByReason = _.countBy(report.rejected, rejection => rejection.reason);
    if (!_.isEmpty(rejectedByReason)) {
        console.info(style.label('rejected', rejectedByReason));
    }
    console.groupEnd();
}

async function maybeUploadToS3({
    s3Client,
    s3Bucket,
    s3Prefix,
    fileName,
    jsonPayload,
}: {
    s3Client: S3Client | null;
    s3Bucket: string;
    s3Prefix: string;
    fileName: string;
    jsonPayload: string;
}): Promise<string | null> {
    if (!s3Client) {
        return null;
    }

    const key = buildReportS3Key(fileName, s3Prefix);
    await s3Client.send(
        new PutObjectCommand({
            Bucket: s3Bucket,
            Key: key,
            Body: jsonPayload,
            ContentType: 'application/json; charset=utf-8',
        }),
    );

    return key;
}

async function importSingleFile({
    reportPath,
    options,
    knowledgeBase,
    extractors,
    s3Client,
    s3Bucket,
    s3Prefix,
}: {
    reportPath: string;
    options: CliOptions;
    knowledgeBase: KnowledgeBase;
    extractors: CandidateExtractor[];
    s3Client: S3Client | null;
    s3Bucket: string;
    s3Prefix: string;
}): Promise<ImportResult> {
    const document = readReportDocument(reportPath, options.ocrTextPath);
    const importedAt = new Date();

    const run = await runPathways({ document, extractors });
    for (const [source, outcome] of Object.entries(run.pathways)) {
        logStep(`${source} pathway`, outcome.status, `${outcome.candidates} candidate(s)`, outcome.error ?? '');
    }

    const result = reconcileReport(run.candidates, knowledgeBase, options.reconcile);
    const report = buildReportFile({ sourcePath: reportPath, importedAt, result, run });

    fs.mkdirSync(PROJECT_DATA_DIR, { recursive: true });
    const outputFileName = resolveOutputFileName({ report, outputDirectory: PROJECT_DATA_DIR });
    const outputPath = path.join(PROJECT_DATA_DIR, outputFileName);
    const jsonPayload = JSON.stringify(report, null, 4);
    fs.writeFileSync(outputPath, jsonPayload, 'utf8');

    const s3Key = await maybeUploadToS3({
        s3Client,
        s3Bucket,
        s3Prefix,
        fileName: outputFileName,
        jsonPayload,
    });

    return { outputPath, s3Key, report };
}

function createS3ClientIfNeeded(options: {
    skipUpload: boolean;
}): { s3Client: S3Client | null; s3Bucket: string; s3Prefix: string } {
    const s3Prefix = process.env.LAB_S3_PREFIX?.trim() || DEFAULT_S3_PREFIX;

    if (options.skipUpload) {
        return { s3Client: null, s3Bucket: '', s3Prefix };
    }

    const s3Bucket = requireEnv('LAB_S3_BUCKET');
    const region = process.env.AWS_REGION?.trim() || process.env.AWS_DEFAULT_REGION?.trim();
    if (!region) {
        throw new Error('Missing required environment variable: AWS_REGION (or AWS_DEFAULT_REGION)');
    }

    const accessKeyId = requireEnv('AWS_ACCESS_KEY_ID');
    const secretAccessKey = requireEnv('AWS_SECRET_ACCESS_KEY');
    const sessionToken = process.env.AWS_SESSION_TOKEN?.trim();

    return {
        s3Client: new S3Client({
            region,
            credentials: {
                accessKeyId,
                secretAccessKey,
                sessionToken: sessionToken || undefined,
            },
        }),
        s3Bucket,
        s3Prefix,
    };
}

function createExtractors(
    options: CliOptions,
    knowledgeBase: KnowledgeBase,
): { extractors: CandidateExtractor[]; modelIds: string[] } {
    const extractors: CandidateExtractor[] = [createPatternExtractor(knowledgeBase)];
    if (options.skipVision) {
        return { extractors, modelIds: [] };
    }

    const modelIds = resolveModelIds(options.modelIds);
    const provider = createOpenRouter({ apiKey: requireEnv('OPENROUTER_API_KEY') });
    extractors.unshift(createVisionExtractor({ provider, modelIds }));
    return { extractors, modelIds };
}

async function runReportImporter(argv: string[] = process.argv.slice(2)): Promise<void> {
    const options = parseCliOptions(argv);
    // Loaded before anything else: without it no report can be reconciled.
    const knowledgeBase = loadKnowledgeBase(PROJECT_KNOWLEDGE_BASE_PATH);
    const { extractors, modelIds } = createExtractors(options, knowledgeBase);
    const files = resolveInputFiles(options);
    const { s3Client, s3Bucket, s3Prefix } = createS3ClientIfNeeded({
        skipUpload: options.skipUpload,
    });

    console.info(`Importing ${files.length} file(s)`);
    console.info(style.label('Knowledge base', `${knowledgeBase.version} (${knowledgeBase.analytes.length} analytes)`));
    if (options.skipVision) {
        console.info('Vision pathway is disabled for this run (--skip-vision)');
    } else {
        console.info(`Model candidates: ${modelIds.join(', ')}`);
    }
    if (options.skipUpload) {
        console.info('S3 upload is disabled for this run (--skip-upload)');
    } else {
        console.info(`S3 destination: s3://${s3Bucket}/${s3Prefix}`);
    }

    const failures: Array<{ file: string; error: unknown }> = [];
    let successCount = 0;
    const elapsed = getTimer();

    for (const filePath of files) {
        console.info(`\nProcessing ${filePath}`);
        try {
            const result = await importSingleFile({
                reportPath: filePath,
                options,
                knowledgeBase,
                extractors,
                s3Client,
                s3Bucket,
                s3Prefix,
            });

            successCount += 1;
            printReportSummary(result.report);
            console.info(`Wrote ${result.outputPath}`);
            if (result.s3Key) {
                console.info(`Uploaded s3://${s3Bucket}/${result.s3Key}`);
            }
        } catch (error) {
            failures.push({ file: filePath, error });
            if (!options.continueOnError) {
                throw error;
            }
            console.error(chalk.red(`Failed ${filePath}:`), describeError(error));
        }
    }

    console.info(`\nCompleted with ${successCount} success(es), ${failures.length} failure(s)`);
    elapsed('import');
    if (failures.length > 0) {
        const failedFiles = failures.map(item => item.file).join('\n');
        throw new Error(`Import failures:\n${failedFiles}`);
    }
}

export {
    parseCliOptions,
    resolveInputFiles,
    resolveModelIds,
    detectReportMediaType,
    readReportDocument,
    runPathways,
    buildReportFile,
    resolveOutputFileName,
    formatReferenceRange,
    runReportImporter,
};

if (isMainModule(import.meta.url)) {
    void createScript(async () => {
        await runReportImporter();
    });
}
