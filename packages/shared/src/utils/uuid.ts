export function generateUUID(): string {
  return globalThis.crypto.randomUUID();
}

export function generateId(prefix?: string): string {
  const uuid = generateUUID();
  return prefix ? `${prefix}-${uuid}` : uuid;
}
