export function singleLineMessage(thrown: unknown): string {
  const text =
    thrown instanceof Error
      ? thrown.stack ?? thrown.message ?? thrown.name
      : String(thrown);
  return text.replace(/\s+/g, ' ');
}
