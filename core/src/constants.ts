/**
 * CheckVault Protocol Constants
 *
 * Constants used throughout the CheckVault core library.
 * Amounts are fixed-point with 18 fractional digits.
 */

// ---------------------------------------------------------------------------
// Fungible Unit Constants
// ---------------------------------------------------------------------------

/** Number of fractional digits of the fungible unit */
export const DECIMALS = 18

/** One whole fungible unit (10^18 base units) */
export const UNIT = 10n ** 18n

/** Supply ceiling: the maximal-rank item is worth exactly this much */
export const MAX_SUPPLY = UNIT

/** Default fungible token name */
export const DEFAULT_TOKEN_NAME = 'Black Check'

/** Default fungible token symbol */
export const DEFAULT_TOKEN_SYMBOL = '$BLKCHK'

// ---------------------------------------------------------------------------
// Rank Constants
// ---------------------------------------------------------------------------

/** Lowest rank an item can have */
export const MIN_RANK = 0

/** Terminal rank, reached only through aggregation */
export const MAX_RANK = 7

/**
 * Divisor of the geometric conversion formula.
 *
 * A rank-r item converts to `2^r * UNIT / RANK_DIVISOR`.
 */
export const RANK_DIVISOR = 4096n

/** Rank of the items consumed by an aggregate merge */
export const AGGREGATE_RANK = MAX_RANK - 1

/** Number of items an aggregate merge takes (2^AGGREGATE_RANK) */
export const AGGREGATE_COUNT = 2 ** AGGREGATE_RANK

// ---------------------------------------------------------------------------
// Lookup Constants
// ---------------------------------------------------------------------------

/** Lookup service identifier for vault event queries */
export const VAULT_LOOKUP_SERVICE = 'ls_checkvault'
