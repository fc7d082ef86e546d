import { createRequire } from 'node:module';
import type { UiohookKeyboardEvent } from 'uiohook-napi';
import { errorMessage } from './errors.js';
const require = createRequire(import.meta.url);

export type KeyEvent = Pick<UiohookKeyboardEvent, 'keycode' | 'ctrlKey' | 'shiftKey' | 'altKey' | 'metaKey'>;
export type KeyMap = Readonly<Record<string, number>>;

type Modifiers = { ctrlKey: boolean; shiftKey: boolean; altKey: boolean; metaKey: boolean };

export type HotkeySpec = Modifiers & {
  keycode: number;
  /** Left and right keycodes of every modifier the combo uses. */
  modifierKeycodes: Set<number>;
};

/** Native keyboard hook, narrowed to what the listener needs. */
export interface KeyHook {
  keyMap: KeyMap;
  on(type: 'keydown' | 'keyup', listener: (event: KeyEvent) => void): void;
  off(type: 'keydown' | 'keyup', listener: (event: KeyEvent) => void): void;
  start(): void;
  stop(): void;
}

// uiohook scancodes, used when the hook's key map has no entry.
const FALLBACK_KEYCODES: Record<string, number> = { space: 57, return: 28, enter: 28, tab: 15, escape: 1, esc: 1 };

export function buildModifierKeycodes(mods: Partial<Modifiers>, keyMap: KeyMap): Set<number> {
  const codes = new Set<number>();
  const add = (...names: string[]) => {
    for (const name of names) {
      const code = keyMap[name];
      if (typeof code === 'number') codes.add(code);
    }
  };
  if (mods.ctrlKey) add('Ctrl', 'CtrlRight');
  if (mods.shiftKey) add('Shift', 'ShiftRight');
  if (mods.altKey) add('Alt', 'AltRight');
  if (mods.metaKey) add('Meta', 'MetaRight');
  return codes;
}

function keycodeFromKeyPart(part: string, keyMap: KeyMap): number | null {
  const name = Object.keys(keyMap).find((k) => k.toLowerCase() === part);
  if (name !== undefined && keyMap[name]) return keyMap[name];
  if (FALLBACK_KEYCODES[part]) return FALLBACK_KEYCODES[part];
  return null;
}

/** `ctrl+shift+space` → keycode plus modifier flags; null when the key is unknown. */
export function parseHotkeyString(hotkey: string, keyMap: KeyMap = {}): HotkeySpec | null {
  if (!hotkey.trim()) return null;
  const parts = hotkey.split('+').map((p) => p.trim().toLowerCase());
  const mods: Modifiers = {
    ctrlKey: parts.some((p) => ['commandorcontrol', 'control', 'ctrl'].includes(p)),
    shiftKey: parts.includes('shift'),
    altKey: parts.some((p) => ['alt', 'option'].includes(p)),
    metaKey: parts.some((p) => ['command', 'cmd', 'meta', 'super'].includes(p))
  };
  const keycode = keycodeFromKeyPart(parts[parts.length - 1], keyMap);
  if (!keycode) return null;
  return { keycode, ...mods, modifierKeycodes: buildModifierKeycodes(mods, keyMap) };
}

export function matchesHotkey(event: KeyEvent, spec: HotkeySpec): boolean {
  return (
    event.keycode === spec.keycode &&
    event.ctrlKey === spec.ctrlKey &&
    event.shiftKey === spec.shiftKey &&
    event.altKey === spec.altKey &&
    event.metaKey === spec.metaKey
  );
}

/** Letting go of the main key or any of its modifiers ends the press. */
export function isReleaseOf(event: KeyEvent, spec: HotkeySpec): boolean {
  return event.keycode === spec.keycode || spec.modifierKeycodes.has(event.keycode);
}

export type KeyListenerOptions = {
  hotkey: string;
  onActivate: () => void;
  onDeactivate: () => void;
  /** Presses closer together than this are dropped. */
  minIntervalMs?: number;
  now?: () => number;
};

/**
 * Turns raw keydown/keyup events into debounced activate/deactivate calls.
 * Auto-repeat keydowns are ignored until the combo is released.
 */
export class KeyListener {
  readonly spec: HotkeySpec | null;
  private active = false;
  private lastActivateAt = Number.NEGATIVE_INFINITY;
  private started = false;

  constructor(
    private readonly hook: KeyHook,
    private readonly options: KeyListenerOptions
  ) {
    this.spec = parseHotkeyString(options.hotkey, hook.keyMap);
  }

  readonly handleKeyDown = (event: KeyEvent): void => {
    if (!this.spec || this.active || !matchesHotkey(event, this.spec)) return;
    const now = (this.options.now ?? Date.now)();
    if (now - this.lastActivateAt < (this.options.minIntervalMs ?? 400)) return;
    this.active = true;
    this.lastActivateAt = now;
    console.debug('[hotkey] activate');
    this.options.onActivate();
  };

  readonly handleKeyUp = (event: KeyEvent): void => {
    if (!this.spec || !this.active || !isReleaseOf(event, this.spec)) return;
    this.active = false;
    console.debug('[hotkey] deactivate');
    this.options.onDeactivate();
  };

  start(): boolean {
    if (this.started) return true;
    if (!this.spec) {
      console.error('[hotkey] cannot parse activation key:', this.options.hotkey);
      return false;
    }
    this.hook.on('keydown', this.handleKeyDown);
    this.hook.on('keyup', this.handleKeyUp);
    this.hook.start();
    this.started = true;
    console.log('[hotkey] listening for', this.options.hotkey);
    return true;
  }

  stop(): void {
    if (!this.started) return;
    this.hook.off('keydown', this.handleKeyDown);
    this.hook.off('keyup', this.handleKeyUp);
    this.hook.stop();
    this.started = false;
    this.active = false;
  }
}

export function loadUiohook(): KeyHook | null {
  let mod: typeof import('uiohook-napi');
  try {
    mod = require('uiohook-napi');
  } catch (err) {
    console.warn('[hotkey] failed to load uiohook-napi:', errorMessage(err));
    return null;
  }
  const hook = mod.uIOhook;
  return {
    keyMap: mod.UiohookKey,
    on(type, listener) {
      if (type === 'keydown') hook.on('keydown', listener);
      else hook.on('keyup', listener);
    },
    off(type, listener) {
      hook.off(type, listener);
    },
    start() {
      hook.start();
    },
    stop() {
      hook.stop();
    }
  };
}

export function createKeyListener(options: KeyListenerOptions, hook: KeyHook | null = loadUiohook()): KeyListener | null {
  if (!hook) return null;
  return new KeyListener(hook, options);
}
