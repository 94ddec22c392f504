import * as fs from 'fs';
import { CGROUP2_FSTYPE } from './types/constants';
import { FatalError, errorMessage } from './errors';
import { debug } from './logger';

export interface MountEntry {
    source: string;
    target: string;
    fstype: string;
    options: string;
}

// The kernel escapes blanks in mount table fields as octal (\040).
function unescapeMountField(field: string): string {
    return field.replace(/\\([0-7]{3})/g, (_, octal: string) => String.fromCharCode(Number.parseInt(octal, 8)));
}

export function parseMountTable(content: string): MountEntry[] {
    return content.split('\n')
        .map(line => line.trim().split(/\s+/))
        .filter(fields => fields.length >= 4)
        .map(([source, target, fstype, options]) => ({
            source,
            target: unescapeMountField(target),
            fstype,
            options,
        }));
}

export function readCgroup2Mounts(mountsFile: string): MountEntry[] {
    let content: string;
    try {
        content = fs.readFileSync(mountsFile, 'utf-8');
    } catch (error) {
        throw new FatalError(`Cannot read mount table ${mountsFile}: ${errorMessage(error)}`);
    }
    return parseMountTable(content).filter(entry => entry.fstype === CGROUP2_FSTYPE);
}

/**
 * Returns the mount point of the cgroup v2 hierarchy.
 * An explicit override wins over the mount table.
 */
export function discoverMountRoot(mountsFile: string, override?: string): string {
    if (override) {
        debug(`Using cgroup2 mount root from environment: ${override}`);
        return override;
    }
    const [first] = readCgroup2Mounts(mountsFile);
    if (!first) {
        throw new FatalError(`No cgroup2 filesystem found in ${mountsFile}; is cgroup v2 mounted?`);
    }
    return first.target;
}
