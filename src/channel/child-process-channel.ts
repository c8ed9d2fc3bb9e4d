import { spawn, type ChildProcess } from 'child_process';
import { incMetric } from '../infra/diagnostics.js';
import { createLogger } from '../infra/logger.js';
import { sanitizeForLog } from '../infra/log-sanitizer.js';
import { getErrorMessage } from '../types/errors.js';
import type {
  JobHandlers,
  JobLauncher,
  JobSignal,
  JobStatus,
  TerminalJob,
  TerminalSize,
} from '../types/terminal-contract.js';

const log = createLogger('channel');

const SIGNALS: Record<JobSignal, NodeJS.Signals> = {
  kill: 'SIGKILL',
  term: 'SIGTERM',
  winch: 'SIGWINCH',
};

export type ChildProcessLauncherOptions = {
  shell?: string;
  term?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
};

/**
 * A job running `shell -c command` with its stdio on pipes. Output of
 * stdout and stderr is delivered as decoded UTF-8 text.
 */
export class ChildProcessJob implements TerminalJob {
  private state: JobStatus;
  private openStreams = 0;
  private released = false;
  private stdinFailed = false;

  constructor(
    private readonly child: ChildProcess,
    private readonly handlers: JobHandlers,
  ) {
    // No pid means the process could not be spawned at all.
    this.state = child.pid === undefined ? 'failed' : 'running';

    for (const stream of [child.stdout, child.stderr]) {
      if (!stream) continue;
      this.openStreams += 1;
      stream.setEncoding('utf8');
      stream.on('data', (chunk: string) => {
        if (!this.released) this.handlers.onOutput(chunk);
      });
    }

    // EPIPE and friends arrive here once the child stops reading stdin.
    child.stdin?.on('error', (error) => {
      if (this.stdinFailed) return;
      this.stdinFailed = true;
      incMetric('job_send_failed');
      log.warn(`stdin of job ${child.pid ?? '-'} failed: ${getErrorMessage(error)}`);
    });

    child.on('error', (error) => {
      log.error(`job process error (pid ${child.pid ?? '-'})`, error);
      if (this.state !== 'ended') this.state = 'failed';
    });
    child.on('exit', (code, signal) => {
      log.debug(`job ${child.pid ?? '-'} exited (${signal ?? code ?? 'unknown'})`);
      this.state = 'ended';
      if (!this.released) this.handlers.onExit();
    });
    child.on('close', () => {
      this.openStreams = 0;
      if (this.state === 'running') this.state = 'ended';
      if (!this.released) this.handlers.onClose();
    });
  }

  status(): JobStatus {
    return this.state;
  }

  isChannelOpen(): boolean {
    return this.openStreams > 0 && this.stdinWritable();
  }

  send(text: string): boolean {
    const stdin = this.child.stdin;
    if (!stdin || !this.stdinWritable()) return false;
    stdin.write(text);
    return true;
  }

  private stdinWritable(): boolean {
    const stdin = this.child.stdin;
    return stdin !== null && !this.stdinFailed && !stdin.destroyed && stdin.writable;
  }

  stop(signal: JobSignal): boolean {
    if (this.state !== 'running') return false;
    return this.child.kill(SIGNALS[signal]);
  }

  /** Pipes carry no window size; the job is told to re-query it. */
  reportWinSize(_rows: number, _cols: number): void {
    this.stop('winch');
  }

  release(): void {
    this.released = true;
  }
}

export class ChildProcessLauncher implements JobLauncher {
  constructor(private readonly options: ChildProcessLauncherOptions = {}) {}

  start(command: string, size: TerminalSize, handlers: JobHandlers): ChildProcessJob {
    const shell = this.options.shell ?? '/bin/sh';
    const child = spawn(shell, ['-c', command], {
      cwd: this.options.cwd,
      stdio: ['pipe', 'pipe', 'pipe'],
      env: {
        ...(this.options.env ?? process.env),
        LINES: String(size.rows),
        COLUMNS: String(size.cols),
        TERM: this.options.term ?? 'xterm-256color',
      },
    });
    log.debug(`started '${sanitizeForLog(command)}' as pid ${child.pid ?? '-'}`);
    return new ChildProcessJob(child, handlers);
  }
}
