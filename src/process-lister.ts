import * as io from '@actions/io';
import { spawn } from 'child_process';
import { IdKind, ProcessLister } from './types/cgroup';
import { errorMessage } from './errors';
import { debug, warning } from './logger';

const PROCESS_COLUMNS = 'pid,user,stat,comm';
const THREAD_COLUMNS = 'pid,tid,user,stat,comm';

// Check if a command exists by trying to access it
async function commandExists(command: string): Promise<boolean> {
    try {
        await io.which(command, true);
        return true;
    } catch {
        return false;
    }
}

export function psArguments(kind: IdKind, ids: number[]): string[] {
    if (kind === 'process') {
        return ['-o', PROCESS_COLUMNS, '-p', ids.join(',')];
    }
    // ps cannot select by thread id, so list every thread and filter.
    return ['-eL', '-o', THREAD_COLUMNS];
}

/**
 * Keeps the header and the rows whose tid column (second) is one of `ids`.
 */
export function filterThreadRows(output: string, ids: number[]): string[] {
    const wanted = new Set(ids);
    const [header, ...rows] = output.split('\n').filter(line => line.trim() !== '');
    if (header === undefined) {
        return [];
    }
    const matching = rows.filter(row => wanted.has(Number(row.trim().split(/\s+/)[1])));
    return [header, ...matching];
}

function runPs(args: string[]): Promise<string> {
    return new Promise((resolve, reject) => {
        const child = spawn('ps', args, { stdio: ['ignore', 'pipe', 'pipe'] });
        let stdout = '';
        let stderr = '';
        child.stdout.on('data', (chunk: Buffer) => { stdout += chunk.toString(); });
        child.stderr.on('data', (chunk: Buffer) => { stderr += chunk.toString(); });
        child.on('error', reject);
        child.on('close', code => {
            // ps exits 1 when none of the pids exist any more; that is not a failure here.
            if (code === 0 || (code === 1 && stderr.trim() === '')) {
                resolve(stdout);
            } else {
                reject(new Error(`ps ${args.join(' ')} exited with ${code}: ${stderr.trim()}`));
            }
        });
    });
}

/**
 * Lists process or thread details with ps(1).
 * A missing or failing ps is reported as a warning and yields no lines.
 */
export class PsProcessLister implements ProcessLister {
    private available: Promise<boolean> | undefined;

    constructor(private readonly run: (args: string[]) => Promise<string> = runPs) {}

    private isAvailable(): Promise<boolean> {
        if (!this.available) {
            this.available = commandExists('ps').then(found => {
                if (!found) {
                    warning('ps not found on PATH; process and thread names will not be shown');
                }
                return found;
            });
        }
        return this.available;
    }

    async describe(kind: IdKind, ids: number[]): Promise<string[]> {
        if (ids.length === 0 || !(await this.isAvailable())) {
            return [];
        }
        const args = psArguments(kind, ids);
        debug(`Running ps ${args.join(' ')}`);
        try {
            const output = await this.run(args);
            return kind === 'thread'
                ? filterThreadRows(output, ids)
                : output.split('\n').filter(line => line.trim() !== '');
        } catch (error) {
            warning(`Cannot list ${kind} names: ${errorMessage(error)}`);
            return [];
        }
    }
}
