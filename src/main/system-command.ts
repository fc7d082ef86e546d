import { spawn } from 'node:child_process';
import { errorMessage } from './errors.js';

export type CommandResult = {
  ok: boolean;
  stdout: string;
  stderr: string;
  status: number | null;
  reason?: string;
};

const commandAvailabilityCache = new Map<string, boolean>();

export function runCommand(cmd: string, args: string[]): Promise<CommandResult> {
  return new Promise((resolve) => {
    let stdout = '';
    let stderr = '';
    let settled = false;

    try {
      const child = spawn(cmd, args, { stdio: ['ignore', 'pipe', 'pipe'] });
      child.stdout?.on('data', (chunk) => {
        stdout += String(chunk ?? '');
      });
      child.stderr?.on('data', (chunk) => {
        stderr += String(chunk ?? '');
      });

      child.on('error', (err) => {
        if (settled) return;
        settled = true;
        resolve({
          ok: false,
          stdout: stdout.trim(),
          stderr: stderr.trim(),
          status: null,
          reason: errorMessage(err)
        });
      });

      child.on('close', (status) => {
        if (settled) return;
        settled = true;
        const out = stdout.trim();
        const err = stderr.trim();
        const ok = status === 0;
        resolve({
          ok,
          stdout: out,
          stderr: err,
          status: typeof status === 'number' ? status : null,
          reason: ok ? undefined : err || `exit ${status ?? 'null'}`
        });
      });
    } catch (err) {
      resolve({
        ok: false,
        stdout: '',
        stderr: '',
        status: null,
        reason: errorMessage(err)
      });
    }
  });
}

export async function hasCmd(cmd: string): Promise<boolean> {
  const cached = commandAvailabilityCache.get(cmd);
  if (cached !== undefined) return cached;

  const result = await runCommand('which', [cmd]);
  commandAvailabilityCache.set(cmd, result.ok);
  return result.ok;
}

export function clearCommandAvailabilityCache(): void {
  commandAvailabilityCache.clear();
}

/** Starts a program detached from this process; resolves false if it cannot be spawned. */
export function launchDetached(cmd: string, args: string[]): Promise<boolean> {
  return new Promise((resolve) => {
    try {
      const child = spawn(cmd, args, { detached: true, stdio: 'ignore' });
      child.once('error', (err) => {
        console.error('[launch] failed to start', cmd, errorMessage(err));
        resolve(false);
      });
      child.once('spawn', () => {
        child.unref();
        resolve(true);
      });
    } catch (err) {
      console.error('[launch] failed to start', cmd, errorMessage(err));
      resolve(false);
    }
  });
}
