import type { ClockPort, RecordingSession, TelemetrySnapshot } from '@rover/domain';
import { describeError, requireStore, type RoverStore } from '../store.js';

export interface SessionStatus {
  active: boolean;
  session: RecordingSession | null;
}

/**
 * Gates persistence on the single global recording session.
 *
 * Explicit session operations surface store errors. The telemetry path
 * (`getActiveSession`, `recordIfActive`) fails open: a store that is missing,
 * slow or broken reads as "not recording" and writes are dropped.
 */
export class SessionRecorder {
  constructor(
    private readonly store: RoverStore | null,
    private readonly clock: ClockPort,
  ) {}

  async startSession(note = ''): Promise<RecordingSession> {
    const { sessions } = requireStore(this.store);
    const session = await sessions.replaceActive({ startedAt: this.clock.now(), note });
    console.log(`[recorder] session ${session.id} started`);
    return session;
  }

  /** Closes every active session. Returns how many were closed (0 is fine). */
  async stopSession(): Promise<number> {
    const { sessions } = requireStore(this.store);
    const closed = await sessions.deactivateAll(this.clock.now());
    if (closed > 0) console.log(`[recorder] ${closed} session(s) stopped`);
    return closed;
  }

  async sessionStatus(): Promise<SessionStatus> {
    const { sessions } = requireStore(this.store);
    const session = await sessions.findActive();
    return { active: session !== null, session };
  }

  async getActiveSession(): Promise<RecordingSession | null> {
    if (!this.store) return null;
    try {
      return await this.store.sessions.findActive();
    } catch (err) {
      console.warn('[recorder] active session lookup failed, treating as inactive:', describeError(err));
      return null;
    }
  }

  /** Persists the snapshot when a session is active. Never throws. */
  async recordIfActive(snapshot: TelemetrySnapshot): Promise<boolean> {
    if (!this.store) return false;
    const active = await this.getActiveSession();
    if (!active) return false;
    try {
      await this.store.telemetry.append(snapshot, this.clock.now());
      return true;
    } catch (err) {
      console.warn('[recorder] telemetry write dropped:', describeError(err));
      return false;
    }
  }
}
