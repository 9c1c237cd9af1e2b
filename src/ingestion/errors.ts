export class InvalidSignatureError extends Error {
  constructor(message = 'Invalid webhook signature') {
    super(message);
    this.name = 'InvalidSignatureError';
  }
}

export class MalformedPayloadError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message);
    this.name = 'MalformedPayloadError';
  }
}

/** The provider should redeliver later; the event was not marked processed. */
export class RetryableIngestionError extends Error {
  constructor(
    message: string,
    public readonly eventId: string,
    public readonly reason: 'in_flight' | 'conflict' | 'not_found' | 'store_error',
  ) {
    super(message);
    this.name = 'RetryableIngestionError';
  }
}
