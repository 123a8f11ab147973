export class InvariantViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvariantViolationError';
  }
}

export const CARD_SUFFIX_PATTERN = /^[0-9]{4}$/;

export const assertCardSuffix = (suffix: string): void => {
  if (!CARD_SUFFIX_PATTERN.test(suffix)) {
    throw new InvariantViolationError(`Card suffix must be exactly 4 ASCII digits, received "${suffix}"`);
  }
};
