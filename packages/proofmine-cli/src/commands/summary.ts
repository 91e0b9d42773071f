import path from 'path';
import chalk from 'chalk';
import fs from 'fs-extra';
import { readManifest, summarizeRecords, errorMessage, type RunSummary } from '@proofmine/core';
import { EXIT_CONFIG_ERROR, EXIT_FAIL } from './constants.js';

export interface SummaryOptions {
    json?: boolean;
}

export function formatSummary(summary: RunSummary): string {
    const rows: Array<[string, number, (text: string) => string]> = [
        ['verified', summary.verified, chalk.green],
        ['failed', summary.failed, chalk.red],
        ['timeout', summary.timeout, chalk.yellow],
        ['error', summary.error, chalk.magenta],
        ['skipped', summary.skipped, chalk.dim],
    ];
    const lines = rows.map(([label, count, paint]) => `  ${paint(label.padEnd(9))}${String(count).padStart(6)}`);
    lines.push(`  ${chalk.bold('total'.padEnd(9))}${String(summary.total).padStart(6)}`);
    return lines.join('\n');
}

export async function summaryCommand(cwd: string, manifest: string, options: SummaryOptions = {}) {
    const manifestPath = path.resolve(cwd, manifest);
    if (!(await fs.pathExists(manifestPath))) {
        console.error(chalk.red(`Error: manifest not found at ${manifestPath}`));
        process.exit(EXIT_CONFIG_ERROR);
        return;
    }

    try {
        const summary = summarizeRecords(await readManifest(manifestPath));
        if (options.json) {
            process.stdout.write(JSON.stringify(summary) + '\n');
            return;
        }
        console.log(chalk.bold(`\n${manifestPath}\n`));
        console.log(formatSummary(summary));
    } catch (error) {
        console.error(chalk.red(`Error: ${errorMessage(error)}`));
        process.exit(EXIT_FAIL);
    }
}
