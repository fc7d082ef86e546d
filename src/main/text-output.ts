import { hasCmd, runCommand } from './system-command.js';

// ── Keystroke injection into the focused window ───────────────────────────────

export type TypingMethod = 'osascript' | 'powershell' | 'wtype' | 'xdotool';

export type TypeResult = {
  ok: boolean;
  method?: TypingMethod;
  reason?: string;
};

export type TypeTextOptions = {
  platform?: NodeJS.Platform;
  env?: NodeJS.ProcessEnv;
};

type LinuxSessionType = 'x11' | 'wayland' | 'unknown';

let backendInfoLogged = false;

export function detectLinuxSessionType(env: NodeJS.ProcessEnv = process.env): LinuxSessionType {
  const raw = String(env.XDG_SESSION_TYPE || '').trim().toLowerCase();
  if (raw === 'x11' || raw === 'wayland') return raw;
  if (env.WAYLAND_DISPLAY) return 'wayland';
  if (env.DISPLAY) return 'x11';
  return 'unknown';
}

export function typingCandidates(platform: NodeJS.Platform, sessionType: LinuxSessionType): TypingMethod[] {
  if (platform === 'darwin') return ['osascript'];
  if (platform === 'win32') return ['powershell'];
  if (sessionType === 'x11') return ['xdotool'];
  if (sessionType === 'wayland') return ['wtype', 'xdotool'];
  return ['xdotool', 'wtype'];
}

function escapeAppleScript(text: string): string {
  return text.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

/** SendKeys treats + ^ % ~ ( ) { } [ ] as syntax; each is wrapped in braces. */
export function escapeSendKeys(text: string): string {
  return text.replace(/[+^%~(){}[\]]/g, '{$&}').replace(/'/g, "''");
}

export function buildTypingCommand(method: TypingMethod, text: string): { cmd: string; args: string[] } {
  switch (method) {
    case 'osascript':
      return { cmd: 'osascript', args: ['-e', `tell application "System Events" to keystroke "${escapeAppleScript(text)}"`] };
    case 'powershell':
      return {
        cmd: 'powershell',
        args: ['-NoProfile', '-Command', `$wshell = New-Object -ComObject wscript.shell; $wshell.SendKeys('${escapeSendKeys(text)}')`]
      };
    case 'wtype':
      return { cmd: 'wtype', args: ['--', text] };
    case 'xdotool':
      return { cmd: 'xdotool', args: ['type', '--clearmodifiers', '--', text] };
  }
}

function logBackendInfoOnce(platform: NodeJS.Platform, env: NodeJS.ProcessEnv): void {
  if (backendInfoLogged) return;
  backendInfoLogged = true;
  const sessionType = detectLinuxSessionType(env);
  console.log('[type] backend routing', {
    platform,
    sessionType,
    candidates: typingCandidates(platform, sessionType),
    hasDisplay: !!env.DISPLAY,
    hasWaylandDisplay: !!env.WAYLAND_DISPLAY
  });
}

/** Types `text` into whatever window has focus, trying each platform backend in turn. */
export async function typeText(text: string, options: TypeTextOptions = {}): Promise<TypeResult> {
  if (!text) return { ok: true };
  const platform = options.platform ?? process.platform;
  const env = options.env ?? process.env;
  logBackendInfoOnce(platform, env);

  const reasons: string[] = [];
  for (const method of typingCandidates(platform, detectLinuxSessionType(env))) {
    if (platform !== 'darwin' && platform !== 'win32' && !(await hasCmd(method))) {
      reasons.push(`${method}: not installed`);
      continue;
    }
    const { cmd, args } = buildTypingCommand(method, text);
    const result = await runCommand(cmd, args);
    if (result.ok) return { ok: true, method };
    reasons.push(`${method}: ${result.reason || 'failed'}`);
  }
  return { ok: false, reason: reasons.join('; ') || 'no typing backend available' };
}
