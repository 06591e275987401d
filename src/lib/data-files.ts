import { fileURLToPath } from 'node:url';
import { join } from 'node:path';

/** Root of the static tables shipped with the package */
export const DATA_DIR = fileURLToPath(new URL('../../data/', import.meta.url));

export const DEFAULT_WORD_LIST_PATH = join(DATA_DIR, 'words.txt');
export const DEFAULT_ACRONYMS_PATH = join(DATA_DIR, 'acronyms.yaml');
export const DEFAULT_VECTORS_DIR = join(DATA_DIR, 'embeddings');
