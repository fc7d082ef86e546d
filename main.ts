#!/usr/bin/env node
import { fileURLToPath } from 'node:url';
import path from 'node:path';

import { setAPP_ROOT, setConfig } from './src/main/ctx.js';
import { loadConfig, getConfigPath, getDataDir, type AppConfig } from './src/main/config-manager.js';
import { createLogger, installConsoleLogger } from './src/main/logger.js';
import { ConfigurationError, errorMessage } from './src/main/errors.js';
import { TranscriptionEngine } from './src/main/runtime/transcription-engine.js';
import { createDictationController } from './src/main/dictation.js';
import { createKeyListener } from './src/main/hotkeys.js';
import { stopWorker } from './src/main/worker-manager.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// ── APP_ROOT setup ────────────────────────────────────────────────────────────
// dist/main.js → project root, so python/worker.py resolves in both layouts.
let ROOT = path.basename(__dirname) === 'dist' ? path.dirname(__dirname) : __dirname;
if (process.env.APP_ROOT) ROOT = process.env.APP_ROOT;
setAPP_ROOT(ROOT);

function readConfig(): AppConfig | null {
  const configPath = getConfigPath();
  try {
    return loadConfig(configPath);
  } catch (err) {
    if (err instanceof ConfigurationError) {
      process.stderr.write(`[config] ${configPath}: ${err.message}\n`);
      return null;
    }
    throw err;
  }
}

function main(): void {
  const config = readConfig();
  if (!config) {
    process.exitCode = 1;
    return;
  }
  setConfig(config);

  const logger = createLogger({
    level: config.misc.log_level,
    logDir: path.join(getDataDir(), 'logs'),
    echo: config.misc.print_to_terminal
  });
  installConsoleLogger(logger);
  console.log('[startup] config loaded', { path: getConfigPath(), mode: config.recording_options.recording_mode });

  const engine = TranscriptionEngine.fromConfig(config);
  console.log('[startup] transcription backend', engine.backendId);
  engine.warmup().catch((err) => {
    console.error('[startup] model warmup failed:', errorMessage(err));
  });

  const controller = createDictationController(config, { engine });
  const listener = createKeyListener({
    hotkey: config.recording_options.activation_key,
    onActivate: () => controller.onActivate(),
    onDeactivate: () => controller.onDeactivate()
  });
  if (!listener || !listener.start()) {
    console.error('[startup] keyboard hook unavailable; nothing to listen to');
    stopWorker();
    process.exitCode = 1;
    return;
  }

  let shuttingDown = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log('[shutdown]', signal);
    listener.stop();
    controller.stop();
    controller
      .whenSettled()
      .catch((err) => console.error('[shutdown] pending session failed:', errorMessage(err)))
      .finally(() => {
        stopWorker();
        process.exit(0);
      });
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main();
