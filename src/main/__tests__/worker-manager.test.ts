import { EventEmitter } from 'node:events';
import { beforeEach, describe, expect, it, vi } from 'vitest';

const { spawnMock } = vi.hoisted(() => ({
  spawnMock: vi.fn()
}));

vi.mock('node:child_process', () => ({
  spawn: spawnMock,
  default: {
    spawn: spawnMock
  }
}));

vi.mock('../resolve.js', () => ({
  resolvePythonCommand: () => 'python3',
  resolveWorkerScriptPath: () => '/opt/dictation/python/worker.py',
  buildWorkerEnv: () => ({})
}));

class FakeWorker extends EventEmitter {
  stdout = new EventEmitter();
  stderr = new EventEmitter();
  stdin = Object.assign(new EventEmitter(), { writable: true, write: vi.fn() });
  exitCode: number | null = null;
  kill = vi.fn();

  reply(message: unknown): void {
    this.stdout.emit('data', Buffer.from(JSON.stringify(message) + '\n'));
  }

  lastRequest(): { id: number; type: string; payload: unknown } {
    const calls = this.stdin.write.mock.calls;
    return JSON.parse(String(calls[calls.length - 1][0]));
  }
}

// Answers `ready` on spawn and every request with a canned result.
function autoReplyingWorker(): FakeWorker {
  const fake = new FakeWorker();
  fake.stdin.write.mockImplementation((line: string) => {
    const request = JSON.parse(line);
    const result = request.type === 'load' ? { device: 'cpu' } : { text: 'hello' };
    queueMicrotask(() => fake.reply({ id: request.id, ok: true, result }));
    return true;
  });
  queueMicrotask(() => fake.reply({ type: 'ready' }));
  return fake;
}

let worker: FakeWorker;

beforeEach(() => {
  vi.resetModules();
  spawnMock.mockReset();
  worker = new FakeWorker();
  spawnMock.mockReturnValue(worker);
});

describe('worker manager', () => {
  it('spawns the worker once and waits for the ready message', async () => {
    const { ensureWorker } = await import('../worker-manager.js');

    const ready = ensureWorker(1000);
    expect(ensureWorker(1000)).toBe(ready);
    worker.reply({ type: 'ready' });
    await expect(ready).resolves.toBeUndefined();

    expect(spawnMock).toHaveBeenCalledTimes(1);
    expect(spawnMock.mock.calls[0][0]).toBe('python3');
    expect(spawnMock.mock.calls[0][1]).toEqual(['-u', '/opt/dictation/python/worker.py']);
  });

  it('matches responses to requests by id', async () => {
    const { ensureWorker, sendWorkerMessage } = await import('../worker-manager.js');
    const ready = ensureWorker(1000);
    worker.reply({ type: 'ready' });
    await ready;

    const pending = sendWorkerMessage('load', { model: 'base' });
    const request = worker.lastRequest();
    expect(request.type).toBe('load');
    worker.reply({ id: request.id + 100, ok: true, result: { loaded: true } });
    worker.reply({ id: request.id, ok: true, result: { loaded: false } });

    await expect(pending).resolves.toEqual({ loaded: false });
  });

  it('rejects a request the worker reports as failed', async () => {
    const { ensureWorker, sendWorkerMessage } = await import('../worker-manager.js');
    const ready = ensureWorker(1000);
    worker.reply({ type: 'ready' });
    await ready;

    const pending = sendWorkerMessage('load', { model: 'base' });
    worker.reply({ id: worker.lastRequest().id, ok: false, error: 'out of memory' });

    await expect(pending).rejects.toThrow('out of memory');
  });

  it('rejects pending requests when the worker exits', async () => {
    const { ensureWorker, sendWorkerMessage } = await import('../worker-manager.js');
    const { BackendInvocationError } = await import('../errors.js');
    const ready = ensureWorker(1000);
    worker.reply({ type: 'ready' });
    await ready;

    const pending = sendWorkerMessage('transcribe', {});
    worker.emit('exit', 1, null);

    await expect(pending).rejects.toBeInstanceOf(BackendInvocationError);
  });

  it('fails startup with BackendInitError when python cannot be spawned', async () => {
    const { ensureWorker } = await import('../worker-manager.js');
    const { BackendInitError } = await import('../errors.js');

    const ready = ensureWorker(1000);
    worker.emit('error', new Error('spawn python3 ENOENT'));

    await expect(ready).rejects.toBeInstanceOf(BackendInitError);
  });

  it('rejects pending requests when writing to the worker fails', async () => {
    const { ensureWorker, sendWorkerMessage } = await import('../worker-manager.js');
    const { BackendInvocationError } = await import('../errors.js');
    const ready = ensureWorker(1000);
    worker.reply({ type: 'ready' });
    await ready;

    const pending = sendWorkerMessage('transcribe', {});
    worker.stdin.emit('error', new Error('write EPIPE'));

    await expect(pending).rejects.toBeInstanceOf(BackendInvocationError);
    await expect(pending).rejects.toThrow('worker stdin error: write EPIPE');
  });

  it('respawns the worker and reloads the model after the worker died', async () => {
    const workers: FakeWorker[] = [];
    spawnMock.mockImplementation(() => {
      const fake = autoReplyingWorker();
      workers.push(fake);
      return fake;
    });
    const { createLocalSttBackend } = await import('../runtime/providers/stt-local-worker.js');
    const { AudioBuffer } = await import('../audio/audio-buffer.js');
    const backend = createLocalSttBackend({
      model: 'base',
      device: 'cpu',
      computeType: 'int8',
      conditionOnPreviousText: true,
      vadFilter: false
    });
    const request = {
      audio: new AudioBuffer(Int16Array.from([1, 2]), 16000),
      decoding: { language: null, initialPrompt: null, temperature: 0 }
    };

    await expect(backend.transcribe(request)).resolves.toEqual({ text: 'hello' });
    workers[0].emit('exit', null, 'SIGKILL');

    await expect(backend.transcribe(request)).resolves.toEqual({ text: 'hello' });
    await expect(backend.transcribe(request)).resolves.toEqual({ text: 'hello' });

    expect(spawnMock).toHaveBeenCalledTimes(2);
    const loads = workers[1].stdin.write.mock.calls.filter(([line]) => JSON.parse(String(line)).type === 'load');
    expect(loads).toHaveLength(1);
  });
});
