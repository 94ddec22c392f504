export interface RunOptions {
    verbose: boolean;
    showProcessNames: boolean;
    showThreadNames: boolean;
    depth: number; // 0 means unbounded
    startPath?: string; // undefined means the mount root
}

export interface RunStats {
    visited: number;
    unpopulated: number;
}

export interface FootnoteEntry {
    id: number;
    text: string;
    triggered: boolean;
}

// Values keyed by interface-file suffix; null means the file is not there.
export type ControllerSnapshot<K extends string> = Record<K, string | null>;

export type CpuField = 'weight' | 'weight.nice' | 'max' | 'pressure';
export type MemoryField = 'current' | 'min' | 'low' | 'high';

export interface CoreState {
    subtreeControl: string | null;
    type: string | null;
    freeze: string | null;
    pids: number[];
    tids: number[];
    descendants: number | null;
    pressure: string | null;
}

export type IdKind = 'process' | 'thread';

export interface ProcessLister {
    describe(kind: IdKind, ids: number[]): Promise<string[]>;
}
