/**
 * Diagnostics on stderr.
 *
 * Warnings always print. Debug lines are JSON and only print when
 * `VMKIT_DEBUG` is set to a truthy value ("1", "true", "yes").
 */

function toBooleanValue(value: string | undefined): boolean {
  if (value === undefined) return false;
  const normalized = value.trim().toLowerCase();
  return normalized === '1' || normalized === 'true' || normalized === 'yes';
}

export function debugEnabled(): boolean {
  return toBooleanValue(process.env.VMKIT_DEBUG);
}

export function debugLog(component: string, message: string, data?: Record<string, unknown>): void {
  if (!debugEnabled()) return;
  const payload = {
    ts: new Date().toISOString(),
    level: 'debug',
    component,
    message,
    ...(data !== undefined ? { data } : {}),
  };
  console.error(JSON.stringify(payload));
}

export function warn(component: string, message: string): void {
  console.warn(`[${component}] warning: ${message}`);
}
