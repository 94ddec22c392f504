import * as core from '@actions/core';
import * as os from 'os';

// Inside a workflow run, problems become annotations; elsewhere they go to stderr.
function inWorkflow(): boolean {
    return process.env.GITHUB_ACTIONS === 'true';
}

function debugEnabled(): boolean {
    return core.isDebug() || process.env.CGEXPLORE_DEBUG === '1';
}

// core.debug always prints; only forward when debugging was asked for.
export function debug(message: string): void {
    if (!debugEnabled()) {
        return;
    }
    if (inWorkflow()) {
        core.debug(message);
    } else {
        process.stderr.write(`cgexplore: debug: ${message}${os.EOL}`);
    }
}

export function info(message: string): void {
    core.info(message);
}

export function warning(message: string): void {
    if (inWorkflow()) {
        core.warning(message);
    } else {
        process.stderr.write(`cgexplore: warning: ${message}${os.EOL}`);
    }
}

export function error(message: string): void {
    if (inWorkflow()) {
        core.error(message);
    } else {
        process.stderr.write(`cgexplore: ${message}${os.EOL}`);
    }
}
