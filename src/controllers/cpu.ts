import { ControllerSnapshot, CpuField } from '../types/cgroup';
import { CPU_PREFIX, Footnote } from '../types/constants';
import { readInterfaceFile } from '../reader';
import { footnoteRef } from '../footnotes';
import { SectionContext, field, sectionHeader, verbatimDump } from './section';

const CPU_FIELDS: CpuField[] = ['weight', 'weight.nice', 'max', 'pressure'];

export function readCpuSnapshot(node: string): ControllerSnapshot<CpuField> {
    return {
        'weight': readInterfaceFile(node, 'cpu.weight'),
        'weight.nice': readInterfaceFile(node, 'cpu.weight.nice'),
        'max': readInterfaceFile(node, 'cpu.max'),
        'pressure': readInterfaceFile(node, 'cpu.pressure'),
    };
}

// The CPU section is left out entirely unless one of its files is present.
export function renderCpu(node: string, snapshot: ControllerSnapshot<CpuField>, ctx: SectionContext): string[] {
    if (!CPU_FIELDS.some(name => snapshot[name] !== null)) {
        return [];
    }
    ctx.footnotes.trigger(Footnote.CpuController);
    const lines = [sectionHeader('CPU', footnoteRef(Footnote.CpuController))];
    if (ctx.verbose) {
        return lines.concat(verbatimDump(node, CPU_PREFIX, ctx.color));
    }
    for (const name of CPU_FIELDS) {
        const value = snapshot[name];
        if (value !== null) {
            lines.push(field(`cpu.${name}`, value));
        }
    }
    return lines;
}
