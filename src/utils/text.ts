export function isBlank(value: string | undefined): boolean {
  return value === undefined || value.trim().length === 0;
}

export function redactSecret(value: string, secret: string | undefined): string {
  if (!secret || !secret.trim()) {
    return value;
  }

  return value.split(secret).join('***');
}

export function truncate(value: string, maxLength: number): string {
  return value.length > maxLength ? `${value.slice(0, maxLength)}…` : value;
}
