/** `1`, `true`, `yes` and `on` (any case, surrounding spaces ignored) turn a flag on. */
export function isEnvFlagSet(raw: string | undefined): boolean {
  const value = raw?.trim().toLowerCase();
  return value === '1' || value === 'true' || value === 'yes' || value === 'on';
}
