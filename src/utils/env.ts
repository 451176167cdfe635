// Switches follow the `NAME=1` / `NAME=true` convention.
export function parseFlag(raw: string): boolean {
  const v = raw.toLowerCase();
  return v === '1' || v === 'true';
}

export function envFlag(name: string, fallback = false): boolean {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return fallback;
  return parseFlag(raw);
}

export function envNumber(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return fallback;
  const n = Number(raw);
  return Number.isFinite(n) ? n : fallback;
}
