/**
 * Deterministic demo users for the seed script. The same `count` always
 * yields the same rows, so reruns are predictable; `offset` continues the
 * sequence after rows that already exist.
 */
const FIRST_NAMES = ['ada', 'grace', 'linus', 'barbara', 'ken', 'margaret', 'dennis', 'frances', 'alan', 'radia'];
const LAST_NAMES = ['lovelace', 'hopper', 'torvalds', 'liskov', 'thompson', 'hamilton', 'ritchie', 'allen', 'turing', 'perlman'];

export interface DemoUser {
  username: string;
  email: string;
}

export function demoUsers(count: number, offset = 0): DemoUser[] {
  return Array.from({ length: count }, (_, i) => {
    const n = offset + i;
    const first = FIRST_NAMES[n % FIRST_NAMES.length];
    const last = LAST_NAMES[Math.floor(n / FIRST_NAMES.length) % LAST_NAMES.length];
    const username = `${first}.${last}${n + 1}`;
    return { username, email: `${username}@example.com` };
  });
}

/** Reads `--count N` from argv; anything missing or not a positive integer gives the fallback. */
export function parseCount(argv: readonly string[], fallback: number): number {
  const idx = argv.indexOf('--count');
  const raw = idx !== -1 ? argv[idx + 1] : undefined;
  const value = raw === undefined ? NaN : Number(raw);
  return Number.isInteger(value) && value > 0 ? value : fallback;
}
