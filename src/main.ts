import * as path from 'path';
import { ProcessLister } from './types/cgroup';
import { USAGE, parseArgs } from './cli';
import { getEnvConfig, EnvConfig } from './config';
import { discoverMountRoot } from './mount';
import { PsProcessLister } from './process-lister';
import { runReport } from './report';
import { FatalError, UsageError, errorMessage } from './errors';
import { error, info } from './logger';

export interface MainDeps {
    env?: EnvConfig;
    lister?: ProcessLister;
}

/**
 * Runs the inspector for the given command-line arguments and returns the
 * process exit code.
 */
export async function main(argv: string[], deps: MainDeps = {}): Promise<number> {
    try {
        const parsed = parseArgs(argv);
        if (parsed.kind === 'help') {
            info(USAGE);
            return 0;
        }

        const env = deps.env ?? getEnvConfig();
        const mountRoot = path.resolve(discoverMountRoot(env.mountsFile, env.mountRoot));
        await runReport(parsed.options, {
            mountRoot,
            mountsFile: env.mountsFile,
            lister: deps.lister ?? new PsProcessLister(),
            color: env.color,
        });
        return 0;
    } catch (err) {
        if (err instanceof UsageError) {
            error(err.message);
            info(USAGE);
        } else if (err instanceof FatalError) {
            error(err.message);
        } else {
            error(`Unexpected failure: ${errorMessage(err)}`);
        }
        return 1;
    }
}
