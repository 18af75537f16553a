export const SUPPORTED_CURRENCIES = ['AUD', 'CAD', 'EUR', 'GBP', 'JPY', 'USD'] as const;

export const MIN_IDEMPOTENCY_KEY_LENGTH = 8;
