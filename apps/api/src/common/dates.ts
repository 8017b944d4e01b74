const DAY_MS = 24 * 60 * 60 * 1000;

/** `YYYY-MM-DD` in UTC, the form the aggregates endpoint takes. */
export const toIsoDate = (date: Date): string => date.toISOString().split('T')[0];

export const daysBefore = (date: Date, days: number): Date => new Date(date.getTime() - days * DAY_MS);
