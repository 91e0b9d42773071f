export const EXIT_PASS = 0;
export const EXIT_FAIL = 1;
export const EXIT_CONFIG_ERROR = 2;
export const EXIT_INTERNAL_ERROR = 3;

export const DEFAULT_OUT_DIR = './extracted_snippets';
