import { describe, expect, it } from '@jest/globals';
import { parseArgs } from './cli';
import { UsageError } from './errors';

describe('parseArgs', () => {
    it('defaults to an unbounded walk of the mount root', () => {
        expect(parseArgs([])).toEqual({
            kind: 'run',
            options: { verbose: false, showProcessNames: false, showThreadNames: false, depth: 0 },
        });
    });

    it('reads separate and grouped flags', () => {
        expect(parseArgs(['-v', '-pt', '-d3', 'user.slice'])).toEqual({
            kind: 'run',
            options: { verbose: true, showProcessNames: true, showThreadNames: true, depth: 3, startPath: 'user.slice' },
        });
        expect(parseArgs(['-vd2'])).toEqual({
            kind: 'run',
            options: { verbose: true, showProcessNames: false, showThreadNames: false, depth: 2 },
        });
    });

    it('returns help for -h', () => {
        expect(parseArgs(['-v', '-h'])).toEqual({ kind: 'help' });
    });

    it('rejects a flag after the cgroup path', () => {
        expect(() => parseArgs(['/sys/fs/cgroup/user.slice', '-v'])).toThrow(UsageError);
    });

    it('rejects a second path', () => {
        expect(() => parseArgs(['a', 'b'])).toThrow('the cgroup path must be the last argument (found "b" after "a")');
    });

    it('rejects -d without digits glued to it', () => {
        expect(() => parseArgs(['-d', '2'])).toThrow('-d needs a number right after it, e.g. -d2 (got "-d")');
        expect(() => parseArgs(['-dx'])).toThrow(UsageError);
    });

    it('rejects unknown flags', () => {
        expect(() => parseArgs(['-x'])).toThrow('unknown option -x');
        expect(() => parseArgs(['--verbose'])).toThrow('unknown option --');
    });
});
