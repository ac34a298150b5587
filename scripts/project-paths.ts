import path from 'path';
import { fileURLToPath } from 'url';

const PROJECT_ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..');

function resolveFromRoot(configured: string | undefined, fallback: string): string {
    const value = configured?.trim();
    if (!value) return fallback;
    return path.isAbsolute(value) ? value : path.resolve(PROJECT_ROOT, value);
}

const PROJECT_DATA_DIR = resolveFromRoot(process.env.LAB_DATA_DIR, path.join(PROJECT_ROOT, 'data'));
const PROJECT_TO_IMPORT_DIR = path.join(PROJECT_DATA_DIR, 'to-import');
const PROJECT_KNOWLEDGE_BASE_PATH = resolveFromRoot(
    process.env.LAB_KNOWLEDGE_BASE_PATH,
    path.join(PROJECT_ROOT, 'knowledge/lab-knowledge-base.json'),
);

export {
    PROJECT_ROOT,
    PROJECT_DATA_DIR,
    PROJECT_TO_IMPORT_DIR,
    PROJECT_KNOWLEDGE_BASE_PATH,
};
