import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { IsolationError, errorMessage } from '../errors.js';
import type { IsolationConfig } from '../types/index.js';
import { Logger } from '../utils/logger.js';

export interface IsolatedUnit {
    /** Fresh temp directory owned by this unit. */
    root: string;
    /** Absolute path of the file handed to the verifier. */
    entryFile: string;
    release(): Promise<void>;
}

export interface Isolator {
    isolate(snippet: string): Promise<IsolatedUnit>;
}

export const DEFAULT_ISOLATION: IsolationConfig = {
    block_opener: 'verus!',
    temp_prefix: 'verus_extract_',
    entry_file: 'src/lib.rs',
    crate_name: 'verus_extract',
    library: 'verus',
};

/**
 * Builds a throwaway crate around a snippet. Every call gets its own
 * `mkdtemp` directory, so concurrent calls with the same text never collide.
 */
export class SnippetIsolator implements Isolator {
    private readonly config: IsolationConfig;
    private readonly tmpRoot: string;

    constructor(config: Partial<IsolationConfig> = {}, tmpRoot: string = os.tmpdir()) {
        this.config = { ...DEFAULT_ISOLATION, ...config };
        this.tmpRoot = tmpRoot;
    }

    wrap(snippet: string): string {
        if (snippet.includes(this.config.block_opener)) {
            return snippet;
        }
        return `${this.config.block_opener} {\n${snippet}\n}\n`;
    }

    manifest(): string {
        return [
            '[package]',
            `name = "${this.config.crate_name}"`,
            'version = "0.1.0"',
            'edition = "2021"',
            '',
            '[dependencies]',
            `${this.config.library} = "*"`,
        ].join('\n');
    }

    async isolate(snippet: string): Promise<IsolatedUnit> {
        let root: string;
        try {
            root = await fs.mkdtemp(path.join(this.tmpRoot, this.config.temp_prefix));
        } catch (error) {
            throw new IsolationError(errorMessage(error), error);
        }

        const unit = createUnit(root, path.join(root, this.config.entry_file));
        try {
            await fs.ensureDir(path.dirname(unit.entryFile));
            await fs.writeFile(unit.entryFile, this.wrap(snippet), 'utf-8');
            await fs.writeFile(path.join(root, 'Cargo.toml'), this.manifest(), 'utf-8');
        } catch (error) {
            await unit.release();
            throw new IsolationError(errorMessage(error), error);
        }

        Logger.debug(`Isolated snippet in ${root}`);
        return unit;
    }
}

function createUnit(root: string, entryFile: string): IsolatedUnit {
    let released = false;
    return {
        root,
        entryFile,
        async release() {
            if (released) return;
            released = true;
            try {
                await fs.remove(root);
                Logger.debug(`Released ${root}`);
            } catch (error) {
                Logger.warn(`Failed to remove ${root}: ${errorMessage(error)}`);
            }
        },
    };
}

/**
 * Runs `fn` against a freshly isolated unit and releases the unit on every
 * exit path, including a throw from `fn`.
 */
export async function withIsolatedUnit<T>(
    isolator: Isolator,
    snippet: string,
    fn: (unit: IsolatedUnit) => Promise<T>
): Promise<T> {
    const unit = await isolator.isolate(snippet);
    try {
        return await fn(unit);
    } finally {
        await unit.release();
    }
}
