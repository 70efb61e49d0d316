/**
 * Label and voter identity normalization.
 *
 * normalizeForMerge produces the merge key: two candidate labels denote the
 * same candidate exactly when their keys are equal.
 */

const HIRAGANA_START = 0x3041;
const HIRAGANA_END = 0x3096;
const KATAKANA_OFFSET = 0x60;

// Whitespace plus , 、 。 ・ ~ 〜 - _ /
const SEPARATORS = /[\s,、。・~〜\-_/]+/gu;

/**
 * Known synonymous spellings, matched against the whole key after the other
 * normalization steps. Half-width entries never match once NFKC has run but
 * are kept so the table reads as the list of accepted spellings.
 */
export const ALIASES: ReadonlyMap<string, string> = new Map([
  ["ﾊﾟｯｹｰｼﾞ", "パッケージ"],
  ["パッケージング", "パッケージ"],
  ["パケ", "パッケージ"],
  ["包装", "パッケージ"],
]);

function hiraganaToKatakana(text: string): string {
  const chars: string[] = [];
  for (const ch of text) {
    const code = ch.codePointAt(0) ?? 0;
    if (code >= HIRAGANA_START && code <= HIRAGANA_END) {
      chars.push(String.fromCodePoint(code + KATAKANA_OFFSET));
    } else {
      chars.push(ch);
    }
  }
  return chars.join("");
}

export function normalizeForMerge(label: unknown): string {
  if (typeof label !== "string") return "";

  let key = label.trim().normalize("NFKC");
  key = hiraganaToKatakana(key);
  key = key.replace(SEPARATORS, "");

  return ALIASES.get(key) ?? key;
}

/** Full-width to half-width, trimmed, upper case. Numbers are kept as text. */
export function normalizeVoterIdentity(value: unknown): string {
  if (typeof value === "number") value = String(value);
  if (typeof value !== "string") return "";
  return value.normalize("NFKC").trim().toUpperCase();
}
