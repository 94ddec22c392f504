import { CoreState } from '../types/cgroup';
import { CORE_FILES, CORE_PREFIX, Footnote } from '../types/constants';
import { parseIdList, parseKeyedFile, readInterfaceFile } from '../reader';
import { footnoteRef } from '../footnotes';
import { SectionContext, field, verbatimDump } from './section';

export function readCoreState(node: string): CoreState {
    const stat = parseKeyedFile(readInterfaceFile(node, CORE_FILES.stat));
    const descendants = stat['nr_descendants'] === undefined ? null : Number(stat['nr_descendants']);
    return {
        subtreeControl: readInterfaceFile(node, CORE_FILES.subtreeControl),
        type: readInterfaceFile(node, CORE_FILES.type),
        freeze: readInterfaceFile(node, CORE_FILES.freeze),
        pids: parseIdList(readInterfaceFile(node, CORE_FILES.procs)),
        tids: parseIdList(readInterfaceFile(node, CORE_FILES.threads)),
        descendants: descendants !== null && Number.isFinite(descendants) ? descendants : null,
        pressure: readInterfaceFile(node, CORE_FILES.pressure),
    };
}

function idSummary(ids: number[]): string {
    return ids.length > 0 ? `${ids.length} (${ids.join(' ')})` : '0';
}

/**
 * Lines for the core (cgroup.*) part of a node.
 * Verbose mode dumps the cgroup.* files verbatim instead of the summary.
 */
export function renderCore(node: string, state: CoreState, ctx: SectionContext): string[] {
    // These notes apply to the node whichever way its files are shown.
    if (state.subtreeControl === '') {
        ctx.footnotes.trigger(Footnote.NoSubtreeControllers);
    }
    if (state.type !== null && state.type !== 'domain') {
        ctx.footnotes.trigger(Footnote.CgroupType);
    }
    if (state.pressure !== null) {
        ctx.footnotes.trigger(Footnote.PressureStall);
    }
    if (ctx.verbose) {
        return verbatimDump(node, CORE_PREFIX, ctx.color);
    }

    const lines: string[] = [];
    if (state.subtreeControl !== null) {
        lines.push(field('subtree_control', state.subtreeControl === ''
            ? `(none) ${footnoteRef(Footnote.NoSubtreeControllers)}`
            : state.subtreeControl));
    }
    if (state.type !== null) {
        if (state.type !== 'domain') {
            lines.push(field('type', `${state.type} ${footnoteRef(Footnote.CgroupType)}`));
        } else {
            lines.push(field('type', state.type));
        }
    }
    if (state.freeze !== null) {
        lines.push(field('freeze', state.freeze));
    }
    lines.push(field('processes', idSummary(state.pids)));
    lines.push(field('threads', idSummary(state.tids)));
    if (state.descendants !== null) {
        lines.push(field('descendants', `${state.descendants}`));
    }
    if (state.pressure !== null) {
        lines.push(field('pressure', `${state.pressure} ${footnoteRef(Footnote.PressureStall)}`));
    }
    return lines;
}
