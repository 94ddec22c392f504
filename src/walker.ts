import * as fs from 'fs';
import * as path from 'path';
import { debug } from './logger';
import { errorMessage } from './errors';

// Number of directory levels between the mount root and `node` (0 for the root).
export function levelBelowMount(node: string, mountRoot: string): number {
    const relative = path.relative(mountRoot, node);
    return relative === '' ? 0 : relative.split(path.sep).length;
}

/**
 * Lists the cgroup directories at and below `startPath`, sorted by path.
 *
 * A nonzero `depth` is measured from the mount root, not from the start path:
 * only descendants less than `depth` levels below the mount root are listed.
 * With `-d1` from the root that leaves the root alone, and a start path nested
 * `depth` or more levels deep yields just itself.
 */
export function walkHierarchy(startPath: string, mountRoot: string, depth = 0): string[] {
    const found: string[] = [];
    if (!isDirectory(startPath)) {
        return found;
    }
    found.push(startPath);

    const pending = [startPath];
    let dir: string | undefined;
    while ((dir = pending.pop()) !== undefined) {
        for (const child of listSubdirectories(dir)) {
            if (depth > 0 && levelBelowMount(child, mountRoot) >= depth) {
                continue;
            }
            found.push(child);
            pending.push(child);
        }
    }
    return found.sort();
}

function isDirectory(target: string): boolean {
    try {
        return fs.statSync(target).isDirectory();
    } catch {
        return false;
    }
}

// Cgroups removed while walking are dropped, not reported.
function listSubdirectories(dir: string): string[] {
    try {
        return fs.readdirSync(dir, { withFileTypes: true })
            .filter(entry => entry.isDirectory())
            .map(entry => path.join(dir, entry.name));
    } catch (error) {
        debug(`Skipping ${dir}: ${errorMessage(error)}`);
        return [];
    }
}
