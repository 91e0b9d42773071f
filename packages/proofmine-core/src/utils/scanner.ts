import { globby } from 'globby';
import fs from 'fs-extra';
import path from 'path';
import type { DiscoveryConfig } from '../types/index.js';

export interface ScannerOptions {
    cwd: string;
    extension?: string;
    excludeDirs?: string[];
}

export class FileScanner {
    private static DEFAULT_EXTENSION = 'rs';
    private static DEFAULT_EXCLUDE_DIRS = ['target', 'tests', 'examples', 'benches', 'docs', 'vendor', '.git'];

    static fromConfig(cwd: string, discovery: DiscoveryConfig): ScannerOptions {
        return { cwd, extension: discovery.extension, excludeDirs: discovery.exclude_dirs };
    }

    /**
     * Recursively lists every file with the source extension under `cwd`,
     * skipping any path with an excluded directory component below `cwd`.
     * Returns absolute paths in component-wise lexicographic order.
     */
    static async findFiles(options: ScannerOptions): Promise<string[]> {
        const extension = (options.extension || this.DEFAULT_EXTENSION).replace(/^\./, '');
        const excludeDirs = options.excludeDirs || this.DEFAULT_EXCLUDE_DIRS;
        const normalizedCwd = path.resolve(options.cwd).replace(/\\/g, '/');

        const files = await globby([`**/*.${extension}`], {
            cwd: normalizedCwd,
            ignore: excludeDirs.map(dir => `**/${dir}/**`),
            dot: true,
            onlyFiles: true,
        });

        return files
            .sort(compareRelativePaths)
            .map(file => path.join(path.resolve(options.cwd), file));
    }

    static async readFile(filePath: string): Promise<string> {
        return fs.readFile(filePath, 'utf-8');
    }
}

// Compares segment by segment so that `a/b.rs` sorts before `a-b/c.rs`.
export function compareRelativePaths(a: string, b: string): number {
    const left = a.split('/');
    const right = b.split('/');
    const length = Math.min(left.length, right.length);
    for (let i = 0; i < length; i++) {
        if (left[i] === right[i]) continue;
        return left[i] < right[i] ? -1 : 1;
    }
    return left.length - right.length;
}
