import { afterAll, beforeAll, describe, expect, it, jest } from '@jest/globals';
import * as fs from 'fs';
import * as path from 'path';
import { listInterfaceFiles, parseIdList, parseKeyedFile, readInterfaceFile } from './reader';
import { createHierarchy, removeHierarchy } from './test-utils';

jest.mock('@actions/core');

describe('reader', () => {
    let root: string;

    beforeAll(() => {
        root = createHierarchy({
            'node': {
                'cgroup.procs': '1\n2\n',
                'cgroup.subtree_control': '\n',
                'cgroup.events': 'populated 1\nfrozen 0\n',
                'cpu.max': 'max 100000\n',
                'cpuset.cpus': '0-3\n',
            },
            'node/child': {},
        });
        fs.mkdirSync(path.join(root, 'node', 'cgroup.dir'));
    });

    afterAll(() => {
        removeHierarchy(root);
    });

    describe('readInterfaceFile', () => {
        it('strips the trailing newline', () => {
            expect(readInterfaceFile(path.join(root, 'node'), 'cpu.max')).toBe('max 100000');
        });

        it('keeps an empty file distinct from a missing one', () => {
            expect(readInterfaceFile(path.join(root, 'node'), 'cgroup.subtree_control')).toBe('');
            expect(readInterfaceFile(path.join(root, 'node'), 'cgroup.type')).toBeNull();
        });

        it('returns null for a node that has gone away', () => {
            expect(readInterfaceFile(path.join(root, 'gone'), 'cgroup.procs')).toBeNull();
        });
    });

    describe('listInterfaceFiles', () => {
        it('lists regular files with the exact prefix, sorted', () => {
            expect(listInterfaceFiles(path.join(root, 'node'), 'cgroup')).toEqual(['cgroup.events', 'cgroup.procs', 'cgroup.subtree_control']);
            expect(listInterfaceFiles(path.join(root, 'node'), 'cpu')).toEqual(['cpu.max']);
        });

        it('returns nothing for a missing node', () => {
            expect(listInterfaceFiles(path.join(root, 'gone'), 'cgroup')).toEqual([]);
        });
    });

    it('parses keyed files', () => {
        expect(parseKeyedFile('populated 1\nfrozen 0')).toEqual({ populated: '1', frozen: '0' });
        expect(parseKeyedFile(null)).toEqual({});
    });

    it('parses id lists', () => {
        expect(parseIdList('12\n34\n')).toEqual([12, 34]);
        expect(parseIdList('')).toEqual([]);
        expect(parseIdList(null)).toEqual([]);
    });
});
