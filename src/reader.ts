import * as fs from 'fs';
import * as path from 'path';
import { errorMessage } from './errors';
import { debug } from './logger';

/**
 * Reads one interface file of a cgroup node.
 * Returns the content without its trailing newline, or null when the file is
 * missing or unreadable (write-only files, nodes removed since listing, files
 * only present on non-root nodes).
 */
export function readInterfaceFile(node: string, name: string): string | null {
    try {
        return fs.readFileSync(path.join(node, name), 'utf-8').replace(/\n$/, '');
    } catch (error) {
        debug(`Cannot read ${path.join(node, name)}: ${errorMessage(error)}`);
        return null;
    }
}

// Sorted names of the regular files in `node` that start with `<prefix>.`
export function listInterfaceFiles(node: string, prefix: string): string[] {
    try {
        return fs.readdirSync(node, { withFileTypes: true })
            .filter(entry => entry.isFile() && entry.name.startsWith(`${prefix}.`))
            .map(entry => entry.name)
            .sort();
    } catch (error) {
        debug(`Cannot list ${node}: ${errorMessage(error)}`);
        return [];
    }
}

/**
 * Parses flat keyed files such as `cgroup.events` and `cgroup.stat`,
 * one `key value` pair per line.
 */
export function parseKeyedFile(content: string | null): Record<string, string> {
    const result: Record<string, string> = {};
    if (content === null) {
        return result;
    }
    for (const line of content.split('\n')) {
        const [key, ...rest] = line.trim().split(/\s+/);
        if (key) {
            result[key] = rest.join(' ');
        }
    }
    return result;
}

export function parseIdList(content: string | null): number[] {
    if (content === null) {
        return [];
    }
    return content.split(/\s+/)
        .filter(token => token !== '')
        .map(token => Number.parseInt(token, 10))
        .filter(id => Number.isInteger(id));
}
