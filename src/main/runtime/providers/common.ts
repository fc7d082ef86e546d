import net from 'node:net';
import { URL } from 'node:url';

export function normalizeBaseEndpoint(endpoint: string, fallback: string): string {
  const raw = String(endpoint || '').trim() || fallback;
  if (!raw) return '';
  if (/^[a-z][a-z0-9+.-]*:\/\//i.test(raw)) return raw.replace(/\/+$/, '');
  if (/^(localhost|\d+\.\d+\.\d+\.\d+)(:\d+)?(\/.*)?$/i.test(raw)) return `http://${raw}`.replace(/\/+$/, '');
  return `https://${raw}`.replace(/\/+$/, '');
}

/** Appends `pathname` to whatever path the base endpoint already carries (e.g. `/v1`). */
export function appendPath(baseEndpoint: string, pathname: string): string {
  const base = normalizeBaseEndpoint(baseEndpoint, '');
  if (!base) return pathname;
  try {
    const parsed = new URL(base);
    parsed.pathname = `${parsed.pathname.replace(/\/+$/, '')}${pathname}`;
    parsed.search = '';
    parsed.hash = '';
    return parsed.toString();
  } catch {
    return `${base.replace(/\/+$/, '')}${pathname}`;
  }
}

function isLocalHost(hostname: string): boolean {
  const value = String(hostname || '').trim().toLowerCase();
  return value === 'localhost' || value === '127.0.0.1' || value === '::1' || value === '[::1]' || value.endsWith('.local');
}

function isPrivateIpAddress(host: string): boolean {
  const value = String(host || '').trim();
  const ipType = net.isIP(value);
  if (ipType === 4) {
    if (value.startsWith('10.')) return true;
    if (value.startsWith('192.168.')) return true;
    if (value.startsWith('169.254.')) return true;
    if (value.startsWith('127.')) return true;
    const parts = value.split('.').map((part) => Number(part));
    return parts.length === 4 && parts[0] === 172 && parts[1] >= 16 && parts[1] <= 31;
  }
  if (ipType === 6) {
    const normalized = value.toLowerCase();
    if (normalized === '::1') return true;
    if (normalized.startsWith('fc') || normalized.startsWith('fd')) return true; // unique local
    return normalized.startsWith('fe80:'); // link-local
  }
  return false;
}

/** Self-hosted servers on this machine or the LAN are allowed to run without an API key. */
export function isLikelyLocalEndpoint(endpoint: string): boolean {
  try {
    const parsed = new URL(endpoint);
    const host = String(parsed.hostname || '').trim().toLowerCase();
    return (
      isLocalHost(host) ||
      isPrivateIpAddress(host) ||
      host.endsWith('.lan') ||
      host.endsWith('.home') ||
      host.endsWith('.home.arpa')
    );
  } catch {
    return false;
  }
}
