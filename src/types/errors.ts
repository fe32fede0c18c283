/**
 * Error types raised by the arbitrage estimator
 */

export class ArbitrageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * A reserve value is non-positive (or not a finite number) where a positive
 * reserve is required.
 */
export class InvalidReserveError extends ArbitrageError {
  readonly label: string;
  readonly value: number;

  constructor(label: string, value: number) {
    super(`Invalid reserve for ${label}: ${value} (must be a positive finite number)`);
    this.label = label;
    this.value = value;
  }
}

/**
 * RPC endpoint unreachable or serving the wrong chain
 */
export class RpcConnectionError extends ArbitrageError {
  readonly url: string;

  constructor(url: string, reason: string) {
    super(`Couldn't connect to rpc ${url}: ${reason}`);
    this.url = url;
  }
}

export class TokenMetadataError extends ArbitrageError {
  readonly tokenAddress: string;

  constructor(tokenAddress: string, reason: string) {
    super(`Failed to fetch metadata for token ${tokenAddress}: ${reason}`);
    this.tokenAddress = tokenAddress;
  }
}

/**
 * Pool does not hold the configured stable/other token pair
 */
export class PoolTokenMismatchError extends ArbitrageError {
  readonly poolAddress: string;

  constructor(poolAddress: string, expected: [string, string], actual: [string, string]) {
    super(
      `Pool ${poolAddress} holds ${actual[0]}/${actual[1]}, expected ${expected[0]}/${expected[1]}`
    );
    this.poolAddress = poolAddress;
  }
}
