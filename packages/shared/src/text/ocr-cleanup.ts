/**
 * Clean-up for noisy OCR output: garbage characters, common misreads of
 * invoice vocabulary, and letters read in place of digits inside amounts.
 */

// U+FFFD and C0 controls other than tab, newline and carriage return
const NOISE_CHARS = /[�\u0000-\u0008\u000B\u000C\u000E-\u001F]/g;

const WORD_FIXES: Array<[RegExp, string]> = [
  [/\barnount\b/gi, 'amount'],
  [/\bbi(?:l1|11)\b/gi, 'bill'],
  [/\btot(?:a1|\s+al)\b/gi, 'total'],
  [/\bk\s?w\s?h\b/gi, 'kWh'],
];

const DIGIT_LOOKALIKES: Record<string, string> = { O: '0', o: '0', l: '1', I: '1', S: '5' };

const CURRENCY_AMOUNT = /(\$\s?)([0-9OolIS][0-9OolIS,]*(?:\.[0-9OolIS]+)?)/g;

export function countNoiseChars(text: string): number {
  return (text.match(NOISE_CHARS) ?? []).length;
}

export function cleanOcrText(text: string): string {
  let cleaned = text.replace(NOISE_CHARS, '');

  for (const [pattern, replacement] of WORD_FIXES) {
    cleaned = cleaned.replace(pattern, replacement);
  }

  cleaned = cleaned.replace(CURRENCY_AMOUNT, (match: string, symbol: string, amount: string) => {
    if (!/\d/.test(amount)) return match;
    return symbol + amount.replace(/[OolIS]/g, (ch) => DIGIT_LOOKALIKES[ch] ?? ch);
  });

  return cleaned
    .replace(/[ \t]+/g, ' ')
    .replace(/ *\n */g, '\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}
