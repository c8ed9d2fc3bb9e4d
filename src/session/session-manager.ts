import type { TerminalConfig } from '../config/index.js';
import { incMetric } from '../infra/diagnostics.js';
import { createLogger, setDebugLogging } from '../infra/logger.js';
import { sanitizeForLog } from '../infra/log-sanitizer.js';
import { InputRouter } from '../input/input-router.js';
import { AttrTable } from '../render/cell-attr.js';
import { changeInDocument, getAttr, redrawSession, updateWindow } from '../render/render-sync.js';
import { SessionStartError } from '../types/errors.js';
import type {
  EngineFactory,
  HostDisplay,
  HostDocument,
  HostWindow,
  JobLauncher,
  TerminalJob,
} from '../types/terminal-contract.js';
import { SessionRegistry } from './session-registry.js';
import { TerminalSession } from './session.js';

const log = createLogger('sessions');

export type OpenRequest = {
  command: string;
  rows?: number;
  cols?: number;
};

export type SessionManagerDeps = {
  host: HostDisplay;
  createEngine: EngineFactory;
  launcher: JobLauncher;
  config: TerminalConfig;
};

export type SessionSummary = {
  id: number;
  name: string;
  status: string;
};

/**
 * Owns every open terminal session and the collaborators they share.
 */
export class SessionManager {
  readonly registry = new SessionRegistry();
  readonly attrs = new AttrTable();

  constructor(private readonly deps: SessionManagerDeps) {
    setDebugLogging(deps.config.debug);
  }

  /**
   * Open a session in a new document and start `command` in it (the
   * configured shell when empty). Throws SessionStartError when the job
   * cannot be started; nothing of the session is left behind then.
   */
  open(request: OpenRequest): TerminalSession {
    const { host, config } = this.deps;
    const command = request.command.trim() || config.shell;

    const created = host.createDocument(this.uniqueName(command));
    if (!created) {
      incMetric('session_start_failed', { reason: 'window' });
      throw new SessionStartError(command, new Error('no window available'));
    }
    const { document, window } = created;

    const pinnedRows = request.rows ?? config.termSize.rows;
    const pinnedCols = request.cols ?? config.termSize.cols;
    const rowsFixed = pinnedRows > 0;
    const colsFixed = pinnedCols > 0;
    const rows = rowsFixed ? pinnedRows : window.height;
    const cols = colsFixed ? pinnedCols : window.width;
    if (rowsFixed || colsFixed) {
      window.setSize(rows, cols);
    }

    const session = new TerminalSession({
      document,
      command,
      rows,
      cols,
      rowsFixed,
      colsFixed,
      context: { host, attrs: this.attrs },
    });
    this.registry.add(session);

    let job: TerminalJob | undefined;
    try {
      session.attachEngine(this.deps.createEngine(rows, cols), config.background);
      job = this.deps.launcher.start(command, session.getSize(), {
        onOutput: (chunk) => session.writeJobOutput(chunk),
        onExit: () => session.handleJobEnded(),
        onClose: () => session.handleChannelClosed(),
      });
      if (job.status() === 'failed') {
        throw new Error('job failed to start');
      }
      session.attachJob(job);
    } catch (error) {
      incMetric('session_start_failed', { reason: 'job' });
      log.error(`could not start '${sanitizeForLog(command)}'`, error);
      job?.release();
      this.registry.remove(session);
      session.destroy();
      host.discardDocument(document);
      throw new SessionStartError(command, error);
    }

    log.debug(`opened document ${document.id} (${session.rows}x${session.cols}) for '${sanitizeForLog(command)}'`);
    return session;
  }

  /** Close the session shown in `document` and discard the document. */
  close(document: HostDocument | number): boolean {
    const session = this.registry.get(document);
    if (!session) return false;
    this.documentDiscarded(session.document);
    this.deps.host.discardDocument(session.document);
    return true;
  }

  /** The host discarded `document`: tear its session down. */
  documentDiscarded(document: HostDocument): void {
    const session = this.registry.get(document);
    if (!session) return;
    this.registry.remove(session);
    session.destroy();
    log.debug(`closed document ${document.id}`);
  }

  get(document: HostDocument | number): TerminalSession | undefined {
    return this.registry.get(document);
  }

  list(): SessionSummary[] {
    return [...this.registry].map((session) => ({
      id: session.document.id,
      name: session.document.name,
      status: session.getStatus(),
    }));
  }

  /** Input router for `session` shown in `window`, using the configured prefix key. */
  createRouter(session: TerminalSession, window: HostWindow): InputRouter {
    return new InputRouter(session, window, this.deps.config.termKey);
  }

  /** Draw a live session into `window`; false when the host draws it from the document. */
  updateWindow(window: HostWindow): boolean {
    const session = this.registry.get(window.document);
    if (!session) return false;
    const drawn = updateWindow(session, window);
    if (drawn) session.dirty.take();
    return drawn;
  }

  /** Redraw pending damage of the session in `document` on all its windows. */
  redraw(document: HostDocument): number {
    const session = this.registry.get(document);
    return session ? redrawSession(session) : 0;
  }

  getAttr(document: HostDocument, line: number, col: number): number {
    const session = this.registry.get(document);
    return session ? getAttr(session, line, col) : 0;
  }

  documentWillChange(document: HostDocument): void {
    const session = this.registry.get(document);
    if (session) changeInDocument(session);
  }

  disposeAll(): void {
    for (const session of [...this.registry]) {
      this.registry.remove(session);
      session.destroy();
    }
  }

  private uniqueName(command: string): string {
    const host = this.deps.host;
    if (!host.findDocumentByName(command)) return command;
    for (let i = 1; ; i += 1) {
      const name = `${command} (${i})`;
      if (!host.findDocumentByName(name)) return name;
    }
  }
}
