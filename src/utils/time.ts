export function nowUtcIsoSeconds(): string {
  return toUtcIsoSeconds(new Date());
}

export function toUtcIsoSeconds(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}
