/**
 * Forex REST endpoints. Paths are signed without the base prefix.
 */

export const PRIVATE_BASE = 'https://forex-api.coin.z.com/private';
export const PUBLIC_BASE = 'https://forex-api.coin.z.com/public';

// ─── PUBLIC ─────────────────────────────────────────────────────────────

/** GET quotes, `symbol=A,B` batches several pairs */
export const PUBLIC_TICKER = '/v1/ticker';

// ─── PRIVATE ────────────────────────────────────────────────────────────

/** GET account balance and available margin */
export const PRIVATE_ASSETS = '/v1/account/assets';

/** POST new order */
export const PRIVATE_ORDER = '/v1/order';

/** POST close specific positions */
export const PRIVATE_CLOSE_ORDER = '/v1/closeOrder';

/** GET fills for an order id */
export const PRIVATE_EXECUTIONS = '/v1/executions';

/** GET open positions, optionally by symbol */
export const PRIVATE_OPEN_POSITIONS = '/v1/openPositions';

/** Envelope message code the exchange uses for throttling. */
export const THROTTLE_CODE = 'ERR-5003';
