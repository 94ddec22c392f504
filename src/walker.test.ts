import { afterAll, beforeAll, describe, expect, it, jest } from '@jest/globals';
import * as path from 'path';
import { levelBelowMount, walkHierarchy } from './walker';
import { createHierarchy, removeHierarchy } from './test-utils';

jest.mock('@actions/core');

describe('walkHierarchy', () => {
    let root: string;
    const at = (...parts: string[]) => path.join(root, ...parts);

    beforeAll(() => {
        root = createHierarchy({
            '': { 'cgroup.controllers': 'cpu memory' },
            'system.slice': {},
            'system.slice/cron.service': {},
            'system.slice/ssh.service': {},
            'user.slice': {},
            'user.slice/user-1000.slice': {},
            'user.slice/user-1000.slice/session-1.scope': {},
            'init.scope': {},
        });
    });

    afterAll(() => {
        removeHierarchy(root);
    });

    it('counts levels from the mount root', () => {
        expect(levelBelowMount(root, root)).toBe(0);
        expect(levelBelowMount(at('user.slice', 'user-1000.slice'), root)).toBe(2);
    });

    it('lists every directory in sorted order when unbounded', () => {
        expect(walkHierarchy(root, root)).toEqual([
            root,
            at('init.scope'),
            at('system.slice'),
            at('system.slice', 'cron.service'),
            at('system.slice', 'ssh.service'),
            at('user.slice'),
            at('user.slice', 'user-1000.slice'),
            at('user.slice', 'user-1000.slice', 'session-1.scope'),
        ]);
    });

    it('keeps only the mount root with depth 1', () => {
        expect(walkHierarchy(root, root, 1)).toEqual([root]);
    });

    it('keeps the first level with depth 2', () => {
        expect(walkHierarchy(root, root, 2)).toEqual([root, at('init.scope'), at('system.slice'), at('user.slice')]);
    });

    it('anchors the depth at the mount root rather than the start path', () => {
        const start = at('user.slice');
        expect(walkHierarchy(start, root, 1)).toEqual([start]);
        expect(walkHierarchy(start, root, 2)).toEqual([start]);
        expect(walkHierarchy(start, root, 3)).toEqual([start, at('user.slice', 'user-1000.slice')]);
    });

    it('returns nothing for a start path that is gone', () => {
        expect(walkHierarchy(at('missing.slice'), root)).toEqual([]);
    });
});
