/** Plain code-unit ordering, so results do not depend on the host locale. */
export const compareTickers = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);
