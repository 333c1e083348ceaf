/**
 * Application constants and configuration defaults
 */

/**
 * Canonical fixed-point precision for every price (18 fractional digits)
 */
export const PRICE_DECIMALS = 18;

export const ONE_18 = 10n ** 18n;

/**
 * Decimals assumed when a pull feed cannot report its own
 */
export const DEFAULT_FEED_DECIMALS = 8;

/**
 * Per-source staleness bound when none is configured (seconds)
 */
export const DEFAULT_STALENESS_SECONDS = 3600;

/**
 * Maximum age of the fallback cache and of the served latest price (seconds)
 */
export const MAX_PRICE_AGE_SECONDS = 86_400;

/**
 * Freshness window for the local latest price and for peer prices (seconds)
 */
export const FRESHNESS_WINDOW_SECONDS = 3600;

/**
 * How far ahead of the local clock a peer timestamp may be (seconds)
 */
export const MAX_CLOCK_SKEW_SECONDS = 300;

/**
 * Number of feed kinds, which bounds minValidSources
 */
export const MAX_SOURCES = 4;

export const DEFAULT_MIN_VALID_SOURCES = 2;

export const MAX_WEIGHT = 255;

/**
 * UQ112x112 fractional bits of pool cumulative price accumulators
 */
export const Q112_SHIFT = 112n;

export const DEFAULT_TWAP_PERIOD_SECONDS = 1800;

export const MAX_POOLS = 2;

/**
 * Remote read channel id used when none is configured
 */
export const DEFAULT_READ_CHANNEL_ID = 4_294_967_295;

export const DEFAULT_READ_CONFIRMATIONS = 1;

/**
 * Unanswered read requests are dropped after this long (seconds)
 */
export const DEFAULT_REQUEST_TTL_SECONDS = 900;

export const BPS_DENOMINATOR = 10_000n;

/**
 * Remote oracle entry point answered by peers
 */
export const READ_ENTRY_POINT = 'getLatestPrice()';

export const ZERO_REF = '0x0000000000000000000000000000000000000000';

/**
 * Producer update loop interval (milliseconds)
 */
export const UPDATE_INTERVAL_MS = 60_000;

export const DEFAULT_STATUS_PORT = 3000;

export const DEFAULT_READ_PORT = 3001;

export const DEFAULT_RPC_URL = 'http://127.0.0.1:8545';

export const PYTH_HERMES_URL = 'https://hermes.pyth.network';

export const DEFAULT_QUOTE_SYMBOL = 'USD';

/**
 * Deviation gate defaults; 0 bps disables the gate
 */
export const DEFAULT_MAX_DEVIATION_BPS = 0;

export const DEFAULT_GRACE_PERIOD_SECONDS = 3600;

/**
 * Consumer adoption: peers that must hold a matching price, and how close it must be
 */
export const DEFAULT_MIN_PEER_AGREEMENT = 1;

export const DEFAULT_MAX_PEER_DIVERGENCE_BPS = 500;
