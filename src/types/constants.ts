export const DEFAULT_MOUNTS_FILE = '/proc/self/mounts';
export const CGROUP2_FSTYPE = 'cgroup2';

// Present in every cgroup v2 directory, the root included.
export const CORE_MARKER_FILE = 'cgroup.controllers';

export const CORE_FILES = {
    controllers: 'cgroup.controllers',
    subtreeControl: 'cgroup.subtree_control',
    type: 'cgroup.type',
    freeze: 'cgroup.freeze',
    procs: 'cgroup.procs',
    threads: 'cgroup.threads',
    events: 'cgroup.events',
    stat: 'cgroup.stat',
    pressure: 'cgroup.pressure',
} as const;

export const CORE_PREFIX = 'cgroup';
export const CPU_PREFIX = 'cpu';

export enum Footnote {
    NoSubtreeControllers = 1,
    CgroupType = 2,
    PressureStall = 3,
    CpuController = 4,
    MemoryController = 5,
}
