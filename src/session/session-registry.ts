import type { HostDocument, TerminalJob } from '../types/terminal-contract.js';
import type { TerminalSession } from './session.js';

/** Open sessions keyed by the id of the document they are bound to. */
export class SessionRegistry {
  private sessions = new Map<number, TerminalSession>();

  add(session: TerminalSession): void {
    const id = session.document.id;
    if (this.sessions.has(id)) {
      throw new Error(`Document ${id} already has a terminal session`);
    }
    this.sessions.set(id, session);
  }

  remove(session: TerminalSession): boolean {
    const id = session.document.id;
    if (this.sessions.get(id) !== session) return false;
    return this.sessions.delete(id);
  }

  get(document: HostDocument | number): TerminalSession | undefined {
    return this.sessions.get(typeof document === 'number' ? document : document.id);
  }

  has(document: HostDocument | number): boolean {
    return this.get(document) !== undefined;
  }

  findByJob(job: TerminalJob): TerminalSession | undefined {
    for (const session of this.sessions.values()) {
      if (session.jobHandle === job) return session;
    }
    return undefined;
  }

  get size(): number {
    return this.sessions.size;
  }

  [Symbol.iterator](): Iterator<TerminalSession> {
    return this.sessions.values();
  }
}
