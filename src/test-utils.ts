import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

// Interface files of one fake cgroup, keyed by file name.
export type FakeCgroupFiles = Record<string, string>;

/**
 * Builds a throwaway directory tree shaped like a cgroup v2 mount.
 * Keys are paths relative to the root ('' for the root itself).
 */
export function createHierarchy(nodes: Record<string, FakeCgroupFiles>): string {
    const root = fs.mkdtempSync(path.join(os.tmpdir(), 'cgexplore-'));
    for (const [relative, files] of Object.entries(nodes)) {
        const dir = path.join(root, relative);
        fs.mkdirSync(dir, { recursive: true });
        for (const [name, content] of Object.entries(files)) {
            fs.writeFileSync(path.join(dir, name), content);
        }
    }
    return root;
}

export function removeHierarchy(root: string): void {
    fs.rmSync(root, { recursive: true, force: true });
}

// Files of an ordinary populated leaf cgroup.
export function populatedLeaf(pids: number[], extra: FakeCgroupFiles = {}): FakeCgroupFiles {
    return {
        'cgroup.controllers': 'cpu memory\n',
        'cgroup.subtree_control': '\n',
        'cgroup.type': 'domain\n',
        'cgroup.freeze': '0\n',
        'cgroup.procs': pids.map(pid => `${pid}\n`).join(''),
        'cgroup.threads': pids.map(pid => `${pid}\n`).join(''),
        'cgroup.events': 'populated 1\nfrozen 0\n',
        'cgroup.stat': 'nr_descendants 0\nnr_dying_descendants 0\n',
        ...extra,
    };
}

export function unpopulatedNode(extra: FakeCgroupFiles = {}): FakeCgroupFiles {
    return populatedLeaf([], { 'cgroup.events': 'populated 0\nfrozen 0\n', ...extra });
}
