import fs from 'fs-extra';
import path from 'path';
import yaml from 'yaml';
import { ConfigError, errorMessage } from './errors.js';
import { ConfigSchema, type Config } from './types/index.js';
import { Logger } from './utils/logger.js';

export const CONFIG_FILE_NAME = 'proofmine.yml';

/**
 * Loads `proofmine.yml` from the scanned repo, or an explicit path.
 * A missing default file yields the defaults; a missing explicit file is an error.
 */
export async function loadConfig(repo: string, explicitPath?: string): Promise<Config> {
    const configPath = explicitPath ? path.resolve(explicitPath) : path.join(repo, CONFIG_FILE_NAME);

    if (!(await fs.pathExists(configPath))) {
        if (explicitPath) {
            throw new ConfigError(`Config file not found: ${configPath}`);
        }
        return ConfigSchema.parse({});
    }

    let raw: unknown;
    try {
        raw = yaml.parse(await fs.readFile(configPath, 'utf-8'));
    } catch (error) {
        throw new ConfigError(`Could not read ${configPath}`, [errorMessage(error)]);
    }

    const parsed = ConfigSchema.safeParse(raw ?? {});
    if (!parsed.success) {
        throw new ConfigError(
            `Invalid config at ${configPath}`,
            parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
        );
    }

    Logger.debug(`Loaded config from ${configPath}`);
    return parsed.data;
}
