import { createStore } from 'zustand/vanilla';
import type { RecordingSession, SessionResult, SessionStatus } from '../main/recording-session.js';

export type ControllerState = {
  /** The only session that may be non-idle. Cleared once its result is delivered. */
  session: RecordingSession | null;
  status: SessionStatus | 'idle';
  /** Continuous mode: a new session starts after each completion while set. */
  loopActive: boolean;
  completedSessions: number;
  lastResult: SessionResult | null;
};

export function createControllerStore() {
  return createStore<ControllerState>(() => ({
    session: null,
    status: 'idle',
    loopActive: false,
    completedSessions: 0,
    lastResult: null
  }));
}

export type ControllerStore = ReturnType<typeof createControllerStore>;
