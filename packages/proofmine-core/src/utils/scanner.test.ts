import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { FileScanner, compareRelativePaths } from './scanner.js';

describe('FileScanner', () => {
    let testDir: string;

    beforeEach(async () => {
        testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'proofmine-scanner-test-'));
    });

    afterEach(async () => {
        await fs.remove(testDir);
    });

    it('honours a custom extension and exclusion list', async () => {
        await fs.outputFile(path.join(testDir, 'theories', 'A.v'), '');
        await fs.outputFile(path.join(testDir, 'build', 'B.v'), '');
        await fs.outputFile(path.join(testDir, 'target', 'C.v'), '');
        await fs.outputFile(path.join(testDir, 'theories', 'D.rs'), '');

        const files = await FileScanner.findFiles({ cwd: testDir, extension: '.v', excludeDirs: ['build'] });

        expect(files).toEqual([
            path.join(testDir, 'target', 'C.v'),
            path.join(testDir, 'theories', 'A.v'),
        ]);
    });

    it('only excludes directory components below the scanned root', async () => {
        const root = path.join(testDir, 'tests', 'crate');
        await fs.outputFile(path.join(root, 'lib.rs'), '');

        expect(await FileScanner.findFiles({ cwd: root })).toEqual([path.join(root, 'lib.rs')]);
    });

    it('includes files under hidden directories that are not excluded', async () => {
        await fs.outputFile(path.join(testDir, '.cargo', 'x.rs'), '');
        await fs.outputFile(path.join(testDir, '.git', 'y.rs'), '');

        expect(await FileScanner.findFiles({ cwd: testDir })).toEqual([path.join(testDir, '.cargo', 'x.rs')]);
    });
});

describe('compareRelativePaths', () => {
    it('orders by path component', () => {
        expect(['a-b/c.rs', 'a/b.rs', 'a.rs'].sort(compareRelativePaths)).toEqual(['a/b.rs', 'a-b/c.rs', 'a.rs']);
    });
});
