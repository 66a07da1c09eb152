export function normalizeCommand(validated: string): string {
  return validated.toLowerCase();
}
