import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { loadConfig, CONFIG_FILE_NAME } from './config.js';
import { ConfigError } from './errors.js';
import { DEFAULT_MARKERS } from './types/index.js';

describe('loadConfig', () => {
    let repo: string;

    beforeEach(async () => {
        repo = await fs.mkdtemp(path.join(os.tmpdir(), 'proofmine-config-test-'));
    });

    afterEach(async () => {
        await fs.remove(repo);
    });

    it('falls back to defaults when the repo has no config file', async () => {
        const config = await loadConfig(repo);

        expect(config.verifier).toEqual({ command: 'verus', args: ['--verify', '--crate-type=lib'], timeout_seconds: 30 });
        expect(config.heuristic.markers).toEqual([...DEFAULT_MARKERS]);
        expect(config.heuristic.import_keyword).toBe('use');
        expect(config.discovery.exclude_dirs).toEqual(['target', 'tests', 'examples', 'benches', 'docs', 'vendor', '.git']);
        expect(config.output).toEqual({ manifest_name: 'manifest.jsonl', include_code: false });
        expect(config.run.concurrency).toBe(1);
    });

    it('merges a partial file over the defaults', async () => {
        await fs.writeFile(path.join(repo, CONFIG_FILE_NAME), `
verifier:
  command: /opt/verus/verus
  timeout_seconds: 5
heuristic:
  markers: [requires, ensures]
`);
        const config = await loadConfig(repo);

        expect(config.verifier.command).toBe('/opt/verus/verus');
        expect(config.verifier.timeout_seconds).toBe(5);
        expect(config.verifier.args).toEqual(['--verify', '--crate-type=lib']);
        expect(config.heuristic.markers).toEqual(['requires', 'ensures']);
        expect(config.isolation.block_opener).toBe('verus!');
    });

    it('treats an empty file as defaults', async () => {
        await fs.writeFile(path.join(repo, CONFIG_FILE_NAME), '');
        const config = await loadConfig(repo);
        expect(config.discovery.extension).toBe('rs');
    });

    it('rejects invalid values with the offending path', async () => {
        await fs.writeFile(path.join(repo, CONFIG_FILE_NAME), 'verifier:\n  timeout_seconds: -1\n');

        await expect(loadConfig(repo)).rejects.toBeInstanceOf(ConfigError);
        await expect(loadConfig(repo)).rejects.toThrow('verifier.timeout_seconds');
    });

    it('rejects an empty marker', async () => {
        await fs.writeFile(path.join(repo, CONFIG_FILE_NAME), 'heuristic:\n  markers: [""]\n');
        await expect(loadConfig(repo)).rejects.toThrow('heuristic.markers.0');
    });

    it('requires an explicitly named file to exist', async () => {
        await expect(loadConfig(repo, path.join(repo, 'nope.yml'))).rejects.toThrow('Config file not found');
    });

    it('reports unparsable YAML', async () => {
        await fs.writeFile(path.join(repo, 'custom.yml'), 'verifier: [unclosed\n');
        await expect(loadConfig(repo, path.join(repo, 'custom.yml'))).rejects.toBeInstanceOf(ConfigError);
    });
});
