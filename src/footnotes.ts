import { Footnote } from './types/constants';
import { FootnoteEntry } from './types/cgroup';

const FOOTNOTE_TEXT: Record<Footnote, string> = {
    [Footnote.NoSubtreeControllers]:
        'No controllers are enabled in cgroup.subtree_control, so children of this cgroup get no ' +
        'controller interface files. Enable one with: echo "+cpu" > <cgroup>/cgroup.subtree_control',
    [Footnote.CgroupType]:
        'cgroup.type is "domain" for normal cgroups. "threaded" cgroups group threads of a process, ' +
        '"domain threaded" is the root of a threaded subtree and "domain invalid" cannot be populated ' +
        'until it is made threaded.',
    [Footnote.PressureStall]:
        'cgroup.pressure reports whether pressure stall information (PSI) accounting is enabled ' +
        'for the cgroup (1) or not (0).',
    [Footnote.CpuController]:
        'cpu.weight is a proportional share in [1, 10000] (default 100), cpu.weight.nice the same as a ' +
        'nice value. cpu.max is "$MAX $PERIOD" in usecs: the group may run $MAX out of every $PERIOD; ' +
        '"max" means no limit.',
    [Footnote.MemoryController]:
        'memory.current is the usage of the cgroup and its descendants. memory.min is a hard protection ' +
        'and memory.low a best-effort one against reclaim; memory.high is a throttle limit ("max" = none). ' +
        'memory.min is shown only for cgroups with threads.',
};

/**
 * Deferred annotations for the report. Sections mark the footnote they rely on
 * while rendering; the driver prints the marked ones once, after all nodes.
 */
export class FootnoteRegistry {
    private readonly entries = new Map<number, FootnoteEntry>();

    constructor(texts: Record<number, string> = FOOTNOTE_TEXT) {
        for (const [id, text] of Object.entries(texts)) {
            this.entries.set(Number(id), { id: Number(id), text, triggered: false });
        }
    }

    trigger(id: number): void {
        const entry = this.entries.get(id);
        if (!entry) {
            throw new Error(`Unknown footnote ${id}`);
        }
        entry.triggered = true;
    }

    isTriggered(id: number): boolean {
        return this.entries.get(id)?.triggered ?? false;
    }

    // Triggered entries in ascending id order.
    triggered(): FootnoteEntry[] {
        return [...this.entries.values()]
            .filter(entry => entry.triggered)
            .sort((a, b) => a.id - b.id);
    }

    render(): string[] {
        return this.triggered().map(entry => `[${entry.id}] ${entry.text}`);
    }
}

// Marker appended to a section header that has a footnote.
export function footnoteRef(id: Footnote): string {
    return `[${id}]`;
}
