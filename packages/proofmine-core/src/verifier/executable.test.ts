import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { isExecutableBinary, resolveExecutable } from './executable.js';

describe.skipIf(process.platform === 'win32')('executable helpers', () => {
    let testDir: string;

    beforeEach(() => {
        testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'proofmine-exec-test-'));
    });

    afterEach(() => {
        fs.rmSync(testDir, { recursive: true, force: true });
    });

    it('detects executable files', () => {
        const binaryPath = path.join(testDir, 'fake-verus');
        fs.writeFileSync(binaryPath, '#!/bin/sh\nexit 0\n', 'utf-8');
        fs.chmodSync(binaryPath, 0o755);

        expect(isExecutableBinary(binaryPath)).toBe(true);
    });

    it('rejects directories and missing files', () => {
        expect(isExecutableBinary(testDir)).toBe(false);
        expect(isExecutableBinary(path.join(testDir, 'absent'))).toBe(false);
    });

    it('resolves bare names through PATH', () => {
        const binaryPath = path.join(testDir, 'fake-verus');
        fs.writeFileSync(binaryPath, '#!/bin/sh\nexit 0\n', 'utf-8');
        fs.chmodSync(binaryPath, 0o755);

        const env = { PATH: ['/nonexistent-dir', testDir].join(':') };
        expect(resolveExecutable('fake-verus', env)).toBe(binaryPath);
        expect(resolveExecutable('other-tool', env)).toBeNull();
    });

    it('checks commands with a path separator directly', () => {
        const binaryPath = path.join(testDir, 'fake-verus');
        fs.writeFileSync(binaryPath, '#!/bin/sh\nexit 0\n', 'utf-8');
        fs.chmodSync(binaryPath, 0o644);

        expect(resolveExecutable(binaryPath, { PATH: '' })).toBeNull();
        fs.chmodSync(binaryPath, 0o755);
        expect(resolveExecutable(binaryPath, { PATH: '' })).toBe(binaryPath);
    });
});
