/**
 * Error types raised while collecting invoices
 */

export type CollectorErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'AUTHENTICATION_FAILED'
  | 'NAVIGATION_FAILED'
  | 'ORDER_SCRAPE_FAILED'
  | 'DELIVERY_FAILED'
  | 'STATE_STORE_FAILED';

export class CollectorError extends Error {
  readonly code: CollectorErrorCode;

  constructor(code: CollectorErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Missing or contradictory options. Raised before the browser starts.
 */
export class ConfigurationError extends CollectorError {
  constructor(message: string) {
    super('CONFIGURATION_ERROR', message);
  }
}

/**
 * Sign-in to the storefront failed.
 * `retryable` is false when the storefront rejected the credentials outright.
 */
export class AuthenticationError extends CollectorError {
  readonly retryable: boolean;

  constructor(message: string, retryable: boolean, options?: { cause?: unknown }) {
    super('AUTHENTICATION_FAILED', message, options);
    this.retryable = retryable;
  }
}

export class NavigationError extends CollectorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('NAVIGATION_FAILED', message, options);
  }
}

/**
 * A single order card could not be read. The order is skipped.
 */
export class OrderScrapeError extends CollectorError {
  readonly orderId?: string;

  constructor(message: string, orderId?: string, options?: { cause?: unknown }) {
    super('ORDER_SCRAPE_FAILED', message, options);
    this.orderId = orderId;
  }
}

export class DeliveryError extends CollectorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('DELIVERY_FAILED', message, options);
  }
}

export class StateStoreError extends CollectorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('STATE_STORE_FAILED', message, options);
  }
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
