import { DEFAULT_MOUNTS_FILE } from './types/constants';

export interface EnvConfig {
    mountRoot?: string;
    mountsFile: string;
    color: boolean;
}

// Environment overrides; command-line options are parsed in cli.ts.
export function getEnvConfig(env: NodeJS.ProcessEnv = process.env, isTTY = Boolean(process.stdout.isTTY)): EnvConfig {
    return {
        mountRoot: env.CGEXPLORE_MOUNT || undefined,
        mountsFile: env.CGEXPLORE_MOUNTS_FILE || DEFAULT_MOUNTS_FILE,
        color: isTTY && env.NO_COLOR === undefined,
    };
}
