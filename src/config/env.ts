export function envNumber(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw === null || String(raw).trim() === '') {
    return fallback;
  }
  const n = Number(raw);
  return Number.isFinite(n) ? n : fallback;
}

export function envString(name: string, fallback: string): string {
  const raw = (process.env[name] ?? '').trim();
  return raw || fallback;
}

export function envBoolean(name: string, fallback: boolean): boolean {
  const raw = (process.env[name] ?? '').trim().toLowerCase();
  if (!raw) return fallback;
  if (['1', 'true', 'yes', 'on'].includes(raw)) return true;
  if (['0', 'false', 'no', 'off'].includes(raw)) return false;
  return fallback;
}

/** Comma-separated list; blank entries are dropped. */
export function envList(...names: string[]): string[] {
  return names
    .map((name) => process.env[name] ?? '')
    .join(',')
    .split(',')
    .map((value) => value.trim())
    .filter(Boolean);
}

export function frontendUrl(): string {
  return envString('FRONTEND_URL', 'http://localhost:5173').replace(/\/+$/, '');
}
