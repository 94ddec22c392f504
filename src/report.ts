import * as fs from 'fs';
import * as path from 'path';
import { ProcessLister, RunOptions, RunStats } from './types/cgroup';
import { CORE_FILES, CORE_MARKER_FILE } from './types/constants';
import { FootnoteRegistry } from './footnotes';
import { readInterfaceFile } from './reader';
import { readCgroup2Mounts } from './mount';
import { walkHierarchy } from './walker';
import { RenderContext, displayPath, printNode } from './render';
import { FatalError, errorMessage } from './errors';
import { debug, info, warning } from './logger';

export interface ReportDeps {
    mountRoot: string;
    mountsFile: string;
    lister: ProcessLister;
    color: boolean;
}

export interface ReportResult {
    stats: RunStats;
    footnotes: number[];
}

// Relative start paths are taken from the mount root.
export function resolveStartPath(startPath: string | undefined, mountRoot: string): string {
    if (startPath === undefined) {
        return mountRoot;
    }
    return path.resolve(mountRoot, startPath);
}

export function validateStartPath(startPath: string): void {
    if (!fs.existsSync(path.join(startPath, CORE_MARKER_FILE))) {
        throw new FatalError(`${startPath} is not a cgroup v2 node (no ${CORE_MARKER_FILE})`);
    }
}

function printSystemSummary(deps: ReportDeps): void {
    info('=== cgroup v2 mounts ===');
    try {
        for (const entry of readCgroup2Mounts(deps.mountsFile)) {
            info(`${entry.source} on ${entry.target} type ${entry.fstype} (${entry.options})`);
        }
    } catch (error) {
        warning(errorMessage(error));
    }
    info('=== cgroup v2 hierarchy ===');
    for (const node of walkHierarchy(deps.mountRoot, deps.mountRoot)) {
        info(displayPath(node, deps.mountRoot));
    }
    info(`Controllers available  : ${readInterfaceFile(deps.mountRoot, CORE_FILES.controllers) ?? ''}`.trimEnd());
    info(`Root subtree_control   : ${readInterfaceFile(deps.mountRoot, CORE_FILES.subtreeControl) ?? ''}`.trimEnd());
    info('');
}

/**
 * Walks the hierarchy from the start path and prints the report.
 * Throws FatalError for an invalid start path or an empty walk.
 */
export async function runReport(options: Readonly<RunOptions>, deps: ReportDeps): Promise<ReportResult> {
    const startPath = resolveStartPath(options.startPath, deps.mountRoot);
    validateStartPath(startPath);

    if (options.verbose) {
        printSystemSummary(deps);
    }

    const depthText = options.depth > 0 ? `${options.depth}` : 'unlimited';
    info(`cgroup v2 report for ${startPath} (mount ${deps.mountRoot}, depth ${depthText})`);
    info('');

    const nodes = walkHierarchy(startPath, deps.mountRoot, options.depth);
    if (nodes.length === 0) {
        throw new FatalError(`No cgroups found under ${startPath}`);
    }
    debug(`Found ${nodes.length} cgroups under ${startPath}`);

    const ctx: RenderContext = {
        mountRoot: deps.mountRoot,
        options,
        footnotes: new FootnoteRegistry(),
        stats: { visited: 0, unpopulated: 0 },
        lister: deps.lister,
        color: deps.color,
    };

    // The mount root is only reported when it was asked for by name.
    const skipRoot = options.startPath === undefined;
    for (const [index, node] of nodes.entries()) {
        if (index === 0 && skipRoot && node === deps.mountRoot) {
            continue;
        }
        await printNode(node, ctx);
        info('');
    }

    const notes = ctx.footnotes.render();
    if (notes.length > 0) {
        info('Notes:');
        notes.forEach(line => info(line));
        info('');
    }
    info(`Total cgroups: ${ctx.stats.visited}, unpopulated: ${ctx.stats.unpopulated}`);

    return { stats: ctx.stats, footnotes: ctx.footnotes.triggered().map(entry => entry.id) };
}
