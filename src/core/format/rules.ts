/**
 * Ordered rewrite rules shared by both converters. A converter is a list of
 * rules applied top to bottom, each one reading the previous one's output.
 */
export interface RewriteRule {
  name: string;
  pattern: RegExp;
  rewrite: (match: RegExpMatchArray) => string;
}

export function replacePattern(
  text: string,
  pattern: RegExp,
  rewrite: (match: RegExpMatchArray) => string,
): string {
  const global = pattern.flags.includes('g') ? pattern : new RegExp(pattern.source, `${pattern.flags}g`);
  let out = '';
  let last = 0;
  for (const match of text.matchAll(global)) {
    const start = match.index ?? 0;
    out += text.slice(last, start) + rewrite(match);
    last = start + match[0].length;
  }
  return out + text.slice(last);
}

export function runRules(text: string, rules: readonly RewriteRule[]): string {
  return rules.reduce((acc, rule) => replacePattern(acc, rule.pattern, rule.rewrite), text);
}

const TOKEN_OPEN = '\uE000';
const TOKEN_CLOSE = '\uE001';

/**
 * Swaps regions out for opaque tokens so later rules cannot match inside
 * them, then puts them back. Tokens use private-use code points.
 */
export class PlaceholderStore {
  private readonly values: string[] = [];

  constructor(private readonly tag: string) {}

  protect(value: string): string {
    const token = `${TOKEN_OPEN}${this.tag}${this.values.length}${TOKEN_CLOSE}`;
    this.values.push(value);
    return token;
  }

  get size(): number {
    return this.values.length;
  }

  restore(text: string): string {
    if (this.values.length === 0) return text;
    return text.replace(this.tokens(), (token: string, index: string) => this.values[Number(index)] ?? token);
  }

  /** Rewrites the values behind the tokens in `text`; the result carries fresh tokens. */
  map(text: string, rewrite: (value: string) => string): string {
    if (this.values.length === 0) return text;
    return text.replace(this.tokens(), (token: string, index: string) => {
      const value = this.values[Number(index)];
      return value === undefined ? token : this.protect(rewrite(value));
    });
  }

  private tokens(): RegExp {
    return new RegExp(`${TOKEN_OPEN}${this.tag}(\\d+)${TOKEN_CLOSE}`, 'g');
  }
}

export const PLACEHOLDER_OPEN = TOKEN_OPEN;
export const PLACEHOLDER_CLOSE = TOKEN_CLOSE;
