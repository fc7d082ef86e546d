import type { MiscOptions } from './config-manager.js';
import type { SessionStatus } from './recording-session.js';

export interface StatusDisplay {
  update(status: SessionStatus, text?: string): void;
}

const LABELS: Record<SessionStatus, string> = {
  recording: 'Recording...',
  transcribing: 'Transcribing...',
  stopped: 'Done'
};

export function formatStatus(status: SessionStatus, text?: string): string {
  if (status === 'stopped' && text) return `${LABELS.stopped}: ${JSON.stringify(text)}`;
  return LABELS[status];
}

/** Status lines go to the log; `hide_status_window` turns them off. */
export function createStatusDisplay(misc: Pick<MiscOptions, 'hide_status_window'>): StatusDisplay | null {
  if (misc.hide_status_window) return null;
  return {
    update(status, text) {
      console.log('[status]', formatStatus(status, text));
    }
  };
}
