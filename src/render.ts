import * as path from 'path';
import { IdKind, ProcessLister, RunOptions, RunStats } from './types/cgroup';
import { CORE_FILES } from './types/constants';
import { FootnoteRegistry } from './footnotes';
import { parseKeyedFile, readInterfaceFile } from './reader';
import { readCoreState, renderCore } from './controllers/core';
import { readCpuSnapshot, renderCpu } from './controllers/cpu';
import { readMemorySnapshot, renderMemory } from './controllers/memory';
import { SectionContext } from './controllers/section';
import { errorMessage } from './errors';
import { info, warning } from './logger';

export interface RenderContext {
    mountRoot: string;
    options: Readonly<RunOptions>;
    footnotes: FootnoteRegistry;
    stats: RunStats;
    lister: ProcessLister;
    color: boolean;
}

// Path as seen from inside the hierarchy: '/' for the mount root.
export function displayPath(node: string, mountRoot: string): string {
    const relative = path.relative(mountRoot, node);
    return relative === '' ? '/' : `/${relative.split(path.sep).join('/')}`;
}

export type Population = 'populated' | 'unpopulated' | 'vanished';

/**
 * Only the mount root lacks cgroup.events; anywhere else a missing file means
 * the cgroup was removed after the walk listed it.
 */
export function populationOf(node: string, mountRoot: string): Population {
    const content = readInterfaceFile(node, CORE_FILES.events);
    if (content === null) {
        return node === mountRoot ? 'populated' : 'vanished';
    }
    return parseKeyedFile(content)['populated'] === '0' ? 'unpopulated' : 'populated';
}

function cgStatLine(node: string): string {
    const stat = parseKeyedFile(readInterfaceFile(node, CORE_FILES.stat));
    const entries = Object.entries(stat).map(([key, value]) => `${key}=${value}`);
    return ` cg stat: ${entries.length > 0 ? entries.join(' ') : 'n/a'}`;
}

async function describeIds(ctx: RenderContext, kind: IdKind, ids: number[]): Promise<string[]> {
    const rows = await ctx.lister.describe(kind, ids);
    return rows.map(row => `    ${row}`);
}

/**
 * Renders one node and returns its report lines.
 *
 * An unpopulated or vanished node gets a one-line notice and no sections; it
 * is still counted as visited and its children are still walked by the caller.
 * Sections run independently: one that throws is logged and the rest still
 * render.
 */
export async function renderNode(node: string, ctx: RenderContext): Promise<string[]> {
    const name = displayPath(node, ctx.mountRoot);
    ctx.stats.visited++;

    const population = populationOf(node, ctx.mountRoot);
    if (population === 'vanished') {
        return [`cgroup ${name} : vanished, skipping`];
    }
    if (population === 'unpopulated') {
        ctx.stats.unpopulated++;
        return [`cgroup ${name} : unpopulated, skipping`];
    }

    const lines = [`cgroup ${name}`];
    const section: SectionContext = { verbose: ctx.options.verbose, color: ctx.color, footnotes: ctx.footnotes };
    let threadCount = 0;

    const sections: Array<[string, () => Promise<string[]>]> = [
        ['core', async () => {
            const state = readCoreState(node);
            threadCount = state.tids.length;
            const out = renderCore(node, state, section);
            if (ctx.options.showProcessNames && state.pids.length > 0) {
                out.push(...await describeIds(ctx, 'process', state.pids));
            }
            if (ctx.options.showThreadNames && state.tids.length > 0) {
                out.push(...await describeIds(ctx, 'thread', state.tids));
            }
            return out;
        }],
        ['cpu', async () => renderCpu(node, readCpuSnapshot(node), section)],
        ['memory', async () => renderMemory(readMemorySnapshot(node), threadCount, section)],
    ];

    for (const [label, run] of sections) {
        try {
            lines.push(...await run());
        } catch (error) {
            warning(`${name}: ${label} section failed: ${errorMessage(error)}`);
        }
    }
    lines.push(cgStatLine(node));
    return lines;
}

export async function printNode(node: string, ctx: RenderContext): Promise<void> {
    for (const line of await renderNode(node, ctx)) {
        info(line);
    }
}
