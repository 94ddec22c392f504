import { afterAll, beforeAll, describe, expect, it, jest } from '@jest/globals';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { discoverMountRoot, parseMountTable, readCgroup2Mounts } from './mount';
import { FatalError } from './errors';

jest.mock('@actions/core');

const MOUNTS = [
    'sysfs /sys sysfs rw,nosuid,nodev,noexec,relatime 0 0',
    'cgroup2 /sys/fs/cgroup cgroup2 rw,nosuid,nodev,noexec,relatime,nsdelegate 0 0',
    'cgroup2 /mnt/cg\\040two cgroup2 rw,relatime 0 0',
    '',
].join('\n');

describe('mount discovery', () => {
    let dir: string;

    beforeAll(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'cgexplore-mounts-'));
        fs.writeFileSync(path.join(dir, 'mounts'), MOUNTS);
        fs.writeFileSync(path.join(dir, 'empty'), 'proc /proc proc rw 0 0\n');
    });

    afterAll(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('parses mount table lines and unescapes targets', () => {
        const entries = parseMountTable(MOUNTS);
        expect(entries).toHaveLength(3);
        expect(entries[2]).toEqual({ source: 'cgroup2', target: '/mnt/cg two', fstype: 'cgroup2', options: 'rw,relatime' });
    });

    it('keeps only cgroup2 mounts', () => {
        expect(readCgroup2Mounts(path.join(dir, 'mounts')).map(entry => entry.target))
            .toEqual(['/sys/fs/cgroup', '/mnt/cg two']);
    });

    it('returns the first cgroup2 mount point', () => {
        expect(discoverMountRoot(path.join(dir, 'mounts'))).toBe('/sys/fs/cgroup');
    });

    it('prefers an explicit override', () => {
        expect(discoverMountRoot(path.join(dir, 'missing'), '/custom/root')).toBe('/custom/root');
    });

    it('fails when no cgroup2 mount exists', () => {
        expect(() => discoverMountRoot(path.join(dir, 'empty'))).toThrow(FatalError);
    });

    it('fails when the mount table cannot be read', () => {
        expect(() => discoverMountRoot(path.join(dir, 'missing'))).toThrow('Cannot read mount table');
    });
});
