import { getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';

export type ExtractedPdfText = {
    fullText: string;
    pageTexts: string[];
};

export function hasPdfSignature(bytes: Uint8Array): boolean {
    return (
        bytes.length >= 4 &&
        bytes[0] === 0x25 &&
        bytes[1] === 0x50 &&
        bytes[2] === 0x44 &&
        bytes[3] === 0x46
    );
}

export function assertPdfSignature(bytes: Uint8Array, filePath: string): void {
    if (bytes.length < 4) {
        throw new Error(`Invalid PDF file (too short): ${filePath}`);
    }
    if (!hasPdfSignature(bytes)) {
        throw new Error(`Invalid PDF signature: ${filePath}`);
    }
}

/** Rebuilds text lines from positioned text items; items within 2 units of height share a line. */
export async function extractPdfText(bytes: Uint8Array): Promise<ExtractedPdfText> {
    // pdf.js detaches the buffer it is given
    const document = await getDocument({ data: bytes.slice() }).promise;
    const pageTexts: string[] = [];

    try {
        for (let pageIndex = 1; pageIndex <= document.numPages; pageIndex++) {
            const page = await document.getPage(pageIndex);
            const textContent = await page.getTextContent();
            const lines: Array<{ y: number; tokens: string[] }> = [];

            for (const item of textContent.items) {
                if (!('str' in item)) continue;
                const token = item.str.trim();
                if (!token) continue;

                const y = Number(item.transform[5]);
                const previousLine = lines.at(-1);
                if (!previousLine || !Number.isFinite(y) || Math.abs(previousLine.y - y) > 2) {
                    lines.push({ y, tokens: [token] });
                } else {
                    previousLine.tokens.push(token);
                }
            }

            const pageBody = lines
                .map(line => line.tokens.join(' ').replace(/\s+/g, ' ').trim())
                .filter(Boolean)
                .join('\n')
                .trim();

            if (pageBody) {
                pageTexts.push(pageBody);
            }
        }
    } finally {
        await document.destroy();
    }

    return {
        fullText: pageTexts.join('\n'),
        pageTexts,
    };
}
