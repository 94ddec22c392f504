import { RunOptions } from './types/cgroup';
import { UsageError } from './errors';

export const USAGE = `Usage: cgexplore [-v] [-p] [-t] [-d<N>] [-h] [cgroup-path]
Report on a cgroup v2 hierarchy, starting at cgroup-path (default: the mount root).

  -v     verbose: system summary, and cgroup.*/cpu.* files shown verbatim
  -p     show process details (via ps) for each cgroup
  -t     show thread details (via ps) for each cgroup
  -d<N>  only descend N levels below the cgroup2 mount point (not below
         cgroup-path); no space between -d and N, 0 means no limit
  -h     show this help

cgroup-path, if given, must be the last argument. A relative path is taken
from the cgroup2 mount point.

Environment:
  CGEXPLORE_MOUNT        use this cgroup2 mount point instead of discovering it
  CGEXPLORE_MOUNTS_FILE  mount table to search (default /proc/self/mounts)
  CGEXPLORE_DEBUG=1      print debug messages
  NO_COLOR               never highlight the verbose dumps`;

export type ParsedArgs =
    | { kind: 'run'; options: Readonly<RunOptions> }
    | { kind: 'help' };

/**
 * Parses getopt-style short flags. Flags may be grouped (-vp) and -d takes
 * its digits from the rest of the same token (-d3, -vd3).
 */
export function parseArgs(argv: string[]): ParsedArgs {
    const options: RunOptions = { verbose: false, showProcessNames: false, showThreadNames: false, depth: 0 };

    for (const arg of argv) {
        if (options.startPath !== undefined) {
            throw new UsageError(`the cgroup path must be the last argument (found "${arg}" after "${options.startPath}")`);
        }
        if (!arg.startsWith('-') || arg === '-') {
            options.startPath = arg;
            continue;
        }
        for (let i = 1; i < arg.length; i++) {
            const flag = arg[i];
            switch (flag) {
                case 'v':
                    options.verbose = true;
                    break;
                case 'p':
                    options.showProcessNames = true;
                    break;
                case 't':
                    options.showThreadNames = true;
                    break;
                case 'h':
                    return { kind: 'help' };
                case 'd': {
                    const digits = arg.slice(i + 1);
                    if (!/^\d+$/.test(digits)) {
                        throw new UsageError(`-d needs a number right after it, e.g. -d2 (got "${arg}")`);
                    }
                    options.depth = Number.parseInt(digits, 10);
                    i = arg.length;
                    break;
                }
                default:
                    throw new UsageError(`unknown option -${flag}`);
            }
        }
    }
    return { kind: 'run', options };
}
