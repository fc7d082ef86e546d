import { spawn, type ChildProcessWithoutNullStreams } from 'node:child_process';
import { logger } from './ctx.js';
import { BackendInitError, BackendInvocationError } from './errors.js';
import { resolvePythonCommand, resolveWorkerScriptPath, buildWorkerEnv } from './resolve.js';

// ── Worker process state ──────────────────────────────────────────────────────
type PendingRequest = {
  resolve: (value: Record<string, unknown>) => void;
  reject: (err: Error) => void;
  timer: NodeJS.Timeout | null;
};

let workerProc: ChildProcessWithoutNullStreams | null = null;
let workerPromise: Promise<void> | null = null;
let workerReadyResolve: (() => void) | null = null;
let workerPending = new Map<number, PendingRequest>();
let workerBuffer = '';
let workerMsgId = 0;
let workerGeneration = 0;

const DEFAULT_STARTUP_TIMEOUT_MS = 15000;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ── STDIO protocol ────────────────────────────────────────────────────────────
function rejectAllPending(reason: string): void {
  const pending = workerPending;
  workerPending = new Map();
  for (const request of pending.values()) {
    if (request.timer) clearTimeout(request.timer);
    request.reject(new BackendInvocationError(reason));
  }
}

export function handleWorkerMessage(msg: unknown): void {
  if (!isRecord(msg)) return;
  if (msg.type === 'ready') {
    workerReadyResolve?.();
    workerReadyResolve = null;
    return;
  }
  if (typeof msg.id !== 'number') return;
  const pending = workerPending.get(msg.id);
  if (!pending) return;
  workerPending.delete(msg.id);
  if (pending.timer) clearTimeout(pending.timer);
  if (msg.ok) {
    pending.resolve(isRecord(msg.result) ? msg.result : {});
  } else {
    pending.reject(new BackendInvocationError(typeof msg.error === 'string' ? msg.error : 'worker error'));
  }
}

function consumeStdout(chunk: Buffer): void {
  workerBuffer += chunk.toString('utf8');
  let idx: number;
  while ((idx = workerBuffer.indexOf('\n')) >= 0) {
    const line = workerBuffer.slice(0, idx).trim();
    workerBuffer = workerBuffer.slice(idx + 1);
    if (!line) continue;
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      logger?.error('[worker] invalid json', line);
      continue;
    }
    handleWorkerMessage(parsed);
  }
}

export function sendWorkerMessage(type: string, payload: Record<string, unknown>, timeoutMs?: number): Promise<Record<string, unknown>> {
  return new Promise((resolve, reject) => {
    const proc = workerProc;
    if (!proc || !proc.stdin.writable) {
      reject(new BackendInvocationError('worker stdin not writable'));
      return;
    }
    const id = ++workerMsgId;
    const timer = timeoutMs
      ? setTimeout(() => {
          if (workerPending.delete(id)) reject(new BackendInvocationError(`worker timeout after ${timeoutMs}ms`));
        }, timeoutMs)
      : null;
    workerPending.set(id, { resolve, reject, timer });
    proc.stdin.write(JSON.stringify({ id, type, payload }) + '\n');
  });
}

// ── Worker lifecycle ──────────────────────────────────────────────────────────
function startWorker(): ChildProcessWithoutNullStreams {
  const scriptPath = resolveWorkerScriptPath();
  if (!scriptPath) throw new BackendInitError('python/worker.py not found');
  const pythonCmd = resolvePythonCommand();
  console.debug('[worker] spawning pythonCmd=%s scriptPath=%s', pythonCmd, scriptPath);
  const proc = spawn(pythonCmd, ['-u', scriptPath], { stdio: ['pipe', 'pipe', 'pipe'], env: buildWorkerEnv() });
  workerBuffer = '';
  proc.stdout.on('data', consumeStdout);
  proc.stderr.on('data', (chunk: Buffer) => logger?.error('[worker]', chunk.toString().trimEnd()));
  proc.stdin.on('error', (err) => {
    logger?.error('[worker] stdin error', err.message);
    if (workerProc === proc) rejectAllPending(`worker stdin error: ${err.message}`);
  });
  proc.on('error', (err) => {
    logger?.error('[worker] process error', err.message);
    if (workerProc !== proc) return;
    workerProc = null;
    workerPromise = null;
    rejectAllPending(`worker process error: ${err.message}`);
  });
  proc.on('exit', (code, signal) => {
    if (workerProc !== proc) return;
    console.log('[worker] exited', { code, signal });
    workerProc = null;
    workerPromise = null;
    rejectAllPending(`worker exited (code ${code ?? 'null'}, signal ${signal ?? 'none'})`);
  });
  return proc;
}

/** Spawns the worker once and resolves when it reports `{ type: 'ready' }`. */
export function ensureWorker(startupTimeoutMs = DEFAULT_STARTUP_TIMEOUT_MS): Promise<void> {
  if (workerPromise) return workerPromise;
  const promise = new Promise<void>((resolve, reject) => {
    const proc = startWorker();
    workerProc = proc;
    workerGeneration += 1;
    const timeout = setTimeout(() => {
      workerReadyResolve = null;
      proc.kill();
      reject(new BackendInitError(`worker did not become ready within ${startupTimeoutMs}ms`));
    }, startupTimeoutMs);
    workerReadyResolve = () => {
      clearTimeout(timeout);
      resolve();
    };
    proc.once('error', (err) => {
      clearTimeout(timeout);
      workerReadyResolve = null;
      reject(new BackendInitError(`worker spawn failed: ${err.message}`, { cause: err }));
    });
    proc.once('exit', (code) => {
      clearTimeout(timeout);
      if (!workerReadyResolve) return;
      workerReadyResolve = null;
      reject(new BackendInitError(`worker exited during startup (code ${code ?? 'null'})`));
    });
  });
  workerPromise = promise;
  promise.catch(() => {
    if (workerPromise === promise) workerPromise = null;
  });
  return promise;
}

/**
 * Increments each time a worker process is spawned. State held by the worker
 * (loaded models) is only valid for the generation it was created in.
 */
export function getWorkerGeneration(): number {
  return workerGeneration;
}

export function stopWorker(): void {
  const proc = workerProc;
  workerProc = null;
  workerPromise = null;
  workerReadyResolve = null;
  rejectAllPending('worker stopped');
  if (proc && proc.exitCode === null) proc.kill();
}
