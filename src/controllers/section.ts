import { FootnoteRegistry } from '../footnotes';
import { listInterfaceFiles, readInterfaceFile } from '../reader';
import { humanBytes } from '../units';

export interface SectionContext {
    verbose: boolean;
    color: boolean;
    footnotes: FootnoteRegistry;
}

const LABEL_WIDTH = 16;
const INDENT = '  ';
const CONTINUATION = ' '.repeat(INDENT.length + LABEL_WIDTH + 2);

// `  label           : value`, with later lines of a multi-line value aligned under the first.
export function field(label: string, value: string): string {
    const [first, ...rest] = value.split('\n');
    const head = `${INDENT}${label.padEnd(LABEL_WIDTH)}: ${first}`.trimEnd();
    return [head, ...rest.map(line => `${CONTINUATION}${line}`)].join('\n');
}

export function sectionHeader(title: string, ref?: string): string {
    return ref ? ` ${title} ${ref}` : ` ${title}`;
}

// Raw value followed by its size in parentheses, when it converts to one.
export function withSize(raw: string): string {
    const size = humanBytes(raw);
    return size ? `${raw} (${size})` : raw;
}

function highlight(text: string, color: boolean): string {
    return color ? `\x1b[1;35m${text}\x1b[0m` : text;
}

/**
 * Every readable `<prefix>.*` file of the node, verbatim.
 * Write-only files (cgroup.kill) read as absent and are left out.
 */
export function verbatimDump(node: string, prefix: string, color: boolean): string[] {
    const lines: string[] = [];
    for (const name of listInterfaceFiles(node, prefix)) {
        const content = readInterfaceFile(node, name);
        if (content === null) {
            continue;
        }
        const label = highlight(`${name}:`, color);
        if (!content.includes('\n')) {
            lines.push(`${INDENT}${label} ${content}`.trimEnd());
            continue;
        }
        lines.push(`${INDENT}${label}`);
        for (const line of content.split('\n')) {
            lines.push(`${INDENT}${INDENT}${line}`);
        }
    }
    return lines;
}
