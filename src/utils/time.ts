export const nowIso = (): string => new Date().toISOString();

export const minutesToMs = (minutes: number): number => minutes * 60 * 1000;
