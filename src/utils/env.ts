const TRUTHY_VALUES = new Set(["1", "true", "yes", "on", "enable", "enabled"]);

export function isEnabled(value: string | undefined): boolean {
  if (!value) return false;
  return TRUTHY_VALUES.has(value.toLowerCase().trim());
}

export function readEnv(name: string): string | undefined {
  const value = process.env[name]?.trim();
  return value ? value : undefined;
}
