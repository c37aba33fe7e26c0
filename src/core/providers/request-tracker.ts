/**
 * RequestTrackerProvider — ticket subjects from Request Tracker via the `rt` client
 */

import { execFile } from 'child_process';
import os from 'os';
import path from 'path';
import { promisify } from 'util';
import { BaseProvider } from '../provider';
import { TicketLinkError, TicketNotFoundError } from '../errors';
import type { FetchedTicket, ProviderOptions } from '../types';

const execFileAsync = promisify(execFile);

const NO_RESULTS = 'No matching results.';

/** Runs a command and resolves with its stdout; rejects on a non-zero exit */
export type CommandRunner = (file: string, args: string[], env: NodeJS.ProcessEnv) => Promise<string>;

export const runCommand: CommandRunner = async (file, args, env) => {
  const { stdout } = await execFileAsync(file, args, { env, timeout: 15_000 });
  return stdout;
};

export interface RequestTrackerProviderOptions extends ProviderOptions {
  /** Path to the rt client configuration; `~` is expanded */
  rtrc: string;
  runner?: CommandRunner;
}

export function expandHome(filePath: string): string {
  if (filePath === '~') return os.homedir();
  if (filePath.startsWith('~/')) return path.join(os.homedir(), filePath.slice(2));
  return filePath;
}

function isMissingBinary(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

export class RequestTrackerProvider extends BaseProvider {
  readonly rtrc: string;
  private readonly runner: CommandRunner;

  constructor(opts: RequestTrackerProviderOptions) {
    super(opts);
    this.rtrc = path.resolve(expandHome(opts.rtrc));
    this.runner = opts.runner ?? runCommand;
  }

  protected async fetchTicket(id: string): Promise<FetchedTicket> {
    const ticket = parseInt(id, 10);
    if (isNaN(ticket)) {
      throw new TicketNotFoundError(this.name, id, 'not a number');
    }

    let output: string;
    try {
      output = await this.runner('rt', ['ls', '-i', String(ticket), '-s'], { ...process.env, RTCONFIG: this.rtrc });
    } catch (err) {
      if (isMissingBinary(err)) {
        throw new TicketLinkError(`[${this.name}] the rt client is not installed`, 'INTERNAL_ERROR', err);
      }
      throw new TicketNotFoundError(this.name, id, 'rt ls failed', err);
    }

    const title = output.trim();
    if (!title || title === NO_RESULTS) {
      throw new TicketNotFoundError(this.name, id, NO_RESULTS);
    }
    return { title };
  }
}
