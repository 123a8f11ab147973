const repeatingWhitespace = /\s+/gu;

export const collapseWhitespace = (input: string): string => input.replace(repeatingWhitespace, ' ').trim();

// Keeps letters in every script; Arabic payees must survive normalization.
export const normalizePayee = (input: string | null | undefined): string | null => {
  if (input === null || input === undefined) {
    return null;
  }

  const normalized = collapseWhitespace(input.normalize('NFC')).toLowerCase();

  return normalized.length > 0 ? normalized : null;
};
