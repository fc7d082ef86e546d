/**
 * Shared mutable context for main-process modules.
 *
 * All exported `let` values are live ESM bindings – any module that imports
 * them will always see the latest value after a setter has been called from
 * main.ts during startup.
 */
import type { AppConfig } from './config-manager.js';
import type { Logger } from './logger.js';

// ── Config, logger, APP_ROOT ─────────────────────────────────────────────────
/** Active application config. Set via setConfig() once loaded. */
export let config: AppConfig | null = null;
/** Active logger instance. Set via setLogger() after createLogger(). */
export let logger: Logger | null = null;
/** Resolved application root directory (project root, parent of dist/ when built). */
export let APP_ROOT: string = '';

export function setConfig(c: AppConfig): void { config = c; }
export function setLogger(l: Logger): void { logger = l; }
export function setAPP_ROOT(r: string): void { APP_ROOT = r; }

// ── fetch ─────────────────────────────────────────────────────────────────────
export const fetchFn: typeof fetch = (input, init) => globalThis.fetch(input, init);
