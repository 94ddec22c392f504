import { ControllerSnapshot, MemoryField } from '../types/cgroup';
import { Footnote } from '../types/constants';
import { readInterfaceFile } from '../reader';
import { footnoteRef } from '../footnotes';
import { SectionContext, field, sectionHeader, withSize } from './section';

export function readMemorySnapshot(node: string): ControllerSnapshot<MemoryField> {
    return {
        current: readInterfaceFile(node, 'memory.current'),
        min: readInterfaceFile(node, 'memory.min'),
        low: readInterfaceFile(node, 'memory.low'),
        high: readInterfaceFile(node, 'memory.high'),
    };
}

/**
 * The MEMORY section, printed for every populated node.
 * memory.min protects nothing in a cgroup without threads, so it is only
 * shown when `threadCount` is nonzero.
 */
export function renderMemory(snapshot: ControllerSnapshot<MemoryField>, threadCount: number, ctx: SectionContext): string[] {
    ctx.footnotes.trigger(Footnote.MemoryController);
    const lines = [sectionHeader('MEMORY', footnoteRef(Footnote.MemoryController))];

    if (snapshot.current !== null) {
        lines.push(field('memory.current', withSize(snapshot.current)));
    }
    if (snapshot.min !== null && threadCount > 0) {
        lines.push(field('memory.min', withSize(snapshot.min)));
    }
    if (snapshot.low !== null) {
        lines.push(field('memory.low', withSize(snapshot.low)));
    }
    if (snapshot.high !== null) {
        lines.push(field('memory.high', withSize(snapshot.high)));
    }
    return lines;
}
