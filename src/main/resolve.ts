import path from 'node:path';
import fs from 'node:fs';
import { APP_ROOT, config, logger } from './ctx.js';

export function resolveBundledPath(relPath: string): string | null {
  const candidates: string[] = [];
  if (APP_ROOT) candidates.push(path.join(APP_ROOT, relPath));
  candidates.push(path.join(process.cwd(), relPath));

  for (const candidate of candidates) {
    if (fs.existsSync(candidate)) return candidate;
  }
  return null;
}

export function resolvePythonCommand(): string {
  const custom = config?.misc.python_path.trim();
  if (custom) return custom;
  const venvPython = resolveBundledPath(path.join('python', '.venv', 'bin', 'python'));
  if (venvPython) return venvPython;
  return process.platform === 'win32' ? 'python' : 'python3';
}

export function resolveWorkerScriptPath(): string | null {
  const script = resolveBundledPath(path.join('python', 'worker.py'));
  if (script) {
    console.debug('[resolveWorkerScriptPath]', script);
    return script;
  }
  console.error('[resolveWorkerScriptPath] worker.py not found', JSON.stringify({ appRoot: APP_ROOT, cwd: process.cwd() }));
  return null;
}

export function buildWorkerEnv(): NodeJS.ProcessEnv {
  const env = { ...process.env };
  if (config?.model_options.local.device === 'cpu') env.CUDA_VISIBLE_DEVICES = '';
  if (logger?.filePath) env.DICTATION_LOG_PATH = logger.filePath;
  if (logger?.levelName) env.DICTATION_LOG_LEVEL = logger.levelName;
  return env;
}
