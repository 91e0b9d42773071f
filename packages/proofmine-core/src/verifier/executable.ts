import fs from 'fs';
import path from 'path';

export function isExecutableBinary(binaryPath: string, platform = process.platform): boolean {
    if (platform === 'win32') {
        return fs.existsSync(binaryPath);
    }

    try {
        if (!fs.statSync(binaryPath).isFile()) return false;
        fs.accessSync(binaryPath, fs.constants.X_OK);
        return true;
    } catch {
        return false;
    }
}

/**
 * Resolves a command the way a shell would: paths containing a separator are
 * checked directly, bare names are looked up on PATH. Returns null when absent.
 */
export function resolveExecutable(
    command: string,
    env: NodeJS.ProcessEnv = process.env,
    platform = process.platform
): string | null {
    if (command.includes('/') || command.includes('\\')) {
        const absolute = path.resolve(command);
        return isExecutableBinary(absolute, platform) ? absolute : null;
    }

    const searchPath = env.PATH ?? env.Path ?? '';
    const delimiter = platform === 'win32' ? ';' : ':';
    const extensions = platform === 'win32'
        ? ['', ...(env.PATHEXT ?? '.EXE;.CMD;.BAT').split(';').filter(Boolean)]
        : [''];

    for (const dir of searchPath.split(delimiter)) {
        if (!dir) continue;
        for (const ext of extensions) {
            const candidate = path.join(dir, command + ext);
            if (isExecutableBinary(candidate, platform)) {
                return candidate;
            }
        }
    }
    return null;
}
