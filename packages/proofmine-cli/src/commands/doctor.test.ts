import { describe, expect, it, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { checkVerifier, doctorCommand } from './doctor.js';

describe.skipIf(process.platform === 'win32')('doctor', () => {
    let binDir: string;

    beforeEach(async () => {
        binDir = await fs.mkdtemp(path.join(os.tmpdir(), 'proofmine-doctor-test-'));
        vi.spyOn(console, 'log').mockImplementation(() => { });
    });

    afterEach(async () => {
        await fs.remove(binDir);
        vi.restoreAllMocks();
    });

    it('reports the resolved path and first version line', async () => {
        const scriptPath = path.join(binDir, 'fake-verus');
        await fs.writeFile(scriptPath, '#!/bin/sh\necho "Verus 0.2025.01.01"\necho "extra"\n');
        await fs.chmod(scriptPath, 0o755);

        expect(await checkVerifier('fake-verus', { PATH: binDir })).toEqual({
            command: 'fake-verus',
            resolved: scriptPath,
            version: 'Verus 0.2025.01.01',
        });
    });

    it('falls back to unknown when --version fails', async () => {
        const scriptPath = path.join(binDir, 'fake-verus');
        await fs.writeFile(scriptPath, '#!/bin/sh\nexit 4\n');
        await fs.chmod(scriptPath, 0o755);

        expect((await checkVerifier(scriptPath)).version).toBe('unknown');
    });

    it('reports a missing verifier', async () => {
        expect(await checkVerifier('missing-verus', { PATH: binDir })).toEqual({
            command: 'missing-verus',
            resolved: null,
            version: 'unknown',
        });
    });

    it('uses the --verifier flag over the config default', async () => {
        const status = await doctorCommand(binDir, { verifier: path.join(binDir, 'absent') });
        expect(status?.resolved).toBeNull();
        expect(status?.command).toBe(path.join(binDir, 'absent'));
    });
});
