import fs from 'fs-extra';
import path from 'path';
import { fileURLToPath } from 'url';

const PACKAGE_NAMES = new Set(['@proofmine/cli', 'proofmine']);

/**
 * Walks up from this module to the first package.json that belongs to the CLI
 * (the workspace package from sources, the root package from dist).
 */
export function getCliVersion(fallback = '0.0.0', from: string = path.dirname(fileURLToPath(import.meta.url))): string {
    let dir = from;
    for (;;) {
        const pkgPath = path.join(dir, 'package.json');
        if (fs.existsSync(pkgPath)) {
            const pkg: unknown = fs.readJsonSync(pkgPath, { throws: false });
            if (isCliPackage(pkg) && pkg.version.trim().length > 0) {
                return pkg.version;
            }
        }
        const parent = path.dirname(dir);
        if (parent === dir) return fallback;
        dir = parent;
    }
}

function isCliPackage(pkg: unknown): pkg is { name: string; version: string } {
    if (typeof pkg !== 'object' || pkg === null) return false;
    if (!('name' in pkg) || !('version' in pkg)) return false;
    return typeof pkg.name === 'string' && PACKAGE_NAMES.has(pkg.name) && typeof pkg.version === 'string';
}
