export const BASE = 10n ** 18n;

export const MIN_EXERCISE_WINDOW = 24 * 60 * 60;

export const MAX_MATCH_FEE = 2n * 10n ** 17n;
export const MAX_EXERCISE_FEE = 5n * 10n ** 15n;
export const MAX_MINT_FEE = 2n * 10n ** 17n;

export const MAX_UINT48 = 2 ** 48 - 1;
export const MAX_UINT64 = 2n ** 64n - 1n;
export const MAX_UINT128 = 2n ** 128n - 1n;
