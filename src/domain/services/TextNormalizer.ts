const ARABIC_INDIC_ZERO = 0x0660;
const arabicIndicDigits = /[٠-٩]/g;
// Latin-1 supplement characters are the visible trace of UTF-8 bytes decoded as Latin-1.
const latin1Supplement = /[\u0080-ÿ]/;
const beyondLatin1 = /[^\u0000-ÿ]/;
const REPLACEMENT_CHARACTER = '�';

const utf8 = new TextDecoder('utf-8', { fatal: false });

export interface NormalizedText {
  text: string;
  repaired: boolean;
}

export const convertArabicIndicDigits = (input: string): string =>
  input.replace(arabicIndicDigits, (digit) => String(digit.charCodeAt(0) - ARABIC_INDIC_ZERO));

export const repairMojibake = (input: string): string => {
  if (!latin1Supplement.test(input) || beyondLatin1.test(input)) {
    return input;
  }

  const decoded = utf8.decode(Buffer.from(input, 'latin1'));

  return decoded.includes(REPLACEMENT_CHARACTER) ? input : decoded;
};

const normalizeOnce = (input: string): string =>
  convertArabicIndicDigits(repairMojibake(input.normalize('NFC')).normalize('NFC')).trim();

export const normalizeMessageText = (input: string | Uint8Array): NormalizedText => {
  const decoded = typeof input === 'string' ? input : utf8.decode(input);

  // Each repair strictly shortens the text, so the loop reaches a fixed point.
  let current = decoded;
  let next = normalizeOnce(current);
  while (next !== current) {
    current = next;
    next = normalizeOnce(current);
  }

  const cosmetic = convertArabicIndicDigits(decoded).trim();

  return { text: current, repaired: current !== cosmetic };
};
