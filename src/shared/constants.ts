export const DEFAULT_PAGE = 1;
export const DEFAULT_PAGE_SIZE = 5;
export const MAX_PAGE_SIZE = 100;

/** Name of the window-count column injected by the pagination rewrite. */
export const TOTAL_COUNT_COLUMN = 'total_count';

/** Database targets a request may talk to. */
export const DATABASE_TARGETS = ['primary', 'secondary'] as const;
export type DatabaseTarget = (typeof DATABASE_TARGETS)[number];
