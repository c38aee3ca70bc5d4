const STOPWORDS = new Set([
  "a", "an", "the", "is", "are", "was", "were", "be", "been", "to", "of", "in",
  "on", "at", "for", "and", "or", "it", "this", "that", "with", "my", "our",
  "i", "we", "you", "will", "has", "have", "do", "does",
  "的", "了", "是", "在", "我", "我们",
]);

const HAN_RUN = /\p{Script=Han}/u;
const TOKEN_PATTERN = /\p{Script=Han}+|\d{1,2}:\d{2}|(?:(?!\p{Script=Han})[\p{L}\p{N}])+/gu;

function toClock(hours: number, minutes: number): string {
  return `${String(hours).padStart(2, "0")}:${String(minutes).padStart(2, "0")}`;
}

/**
 * Lowercases and rewrites clock times into 24h `HH:MM`, so "3pm", "3:00 PM"
 * and "下午3点" all become "15:00".
 */
export function normalizeText(text: string): string {
  let out = text.toLowerCase();

  out = out.replace(/\b(\d{1,2})(?::(\d{2}))?\s*(a\.?m\.?|p\.?m\.?)(?![a-z])/g, (match, h: string, m: string | undefined, suffix: string) => {
    let hours = Number(h);
    const minutes = m ? Number(m) : 0;
    if (hours > 12 || minutes > 59) return match;
    const pm = suffix.startsWith("p");
    if (pm && hours < 12) hours += 12;
    if (!pm && hours === 12) hours = 0;
    return toClock(hours, minutes);
  });

  out = out.replace(/(上午|早上|下午|晚上)?(\d{1,2})[点點](?:(\d{1,2})分?|半)?/g, (match, period: string | undefined, h: string, m: string | undefined) => {
    let hours = Number(h);
    const minutes = match.endsWith("半") ? 30 : m ? Number(m) : 0;
    if (hours > 23 || minutes > 59) return match;
    if ((period === "下午" || period === "晚上") && hours < 12) hours += 12;
    return ` ${toClock(hours, minutes)} `;
  });

  out = out.replace(/\b(\d{1,2}):(\d{2})\b/g, (match, h: string, m: string) => {
    const hours = Number(h);
    const minutes = Number(m);
    if (hours > 23 || minutes > 59) return match;
    return toClock(hours, minutes);
  });

  return out;
}

/** Splits a run of Han characters into overlapping bigrams. */
function hanBigrams(run: string): string[] {
  const chars = Array.from(run);
  if (chars.length < 2) return chars;
  const grams: string[] = [];
  for (let i = 0; i < chars.length - 1; i++) {
    grams.push(chars[i] + chars[i + 1]);
  }
  return grams;
}

export function tokenize(text: string): string[] {
  const tokens: string[] = [];
  for (const match of normalizeText(text).matchAll(TOKEN_PATTERN)) {
    const token = match[0];
    if (HAN_RUN.test(token)) {
      tokens.push(...hanBigrams(token));
    } else {
      tokens.push(token);
    }
  }
  return tokens;
}

export function isStopword(token: string): boolean {
  return STOPWORDS.has(token);
}

export function contentTokens(text: string): string[] {
  return tokenize(text).filter((token) => !STOPWORDS.has(token));
}

export function containsHan(text: string): boolean {
  return HAN_RUN.test(text);
}
