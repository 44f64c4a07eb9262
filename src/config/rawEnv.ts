/**
 * Env access for modules that must not trigger the full config load
 * (db bootstrap runs in tests before any env is stubbed).
 */
export function getEnv(name: string, fallback?: string): string | undefined {
  const value = process.env[name];
  if (value == null || value.trim() === "") {
    return fallback;
  }
  return value.trim();
}
