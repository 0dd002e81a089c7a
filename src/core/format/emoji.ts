/** Mattermost short names for the emoji both sides render natively. */
const NAME_TO_EMOJI: Readonly<Record<string, string>> = {
  '+1': '\u{1F44D}',
  '-1': '\u{1F44E}',
  heart: '\u2764\uFE0F',
  smile: '\u{1F604}',
  laughing: '\u{1F606}',
  thumbsup: '\u{1F44D}',
  thumbsdown: '\u{1F44E}',
  wave: '\u{1F44B}',
  clap: '\u{1F44F}',
  fire: '\u{1F525}',
  '100': '\u{1F4AF}',
  tada: '\u{1F389}',
  eyes: '\u{1F440}',
  thinking: '\u{1F914}',
  white_check_mark: '\u2705',
  x: '\u274C',
  warning: '\u26A0\uFE0F',
  rocket: '\u{1F680}',
  star: '\u2B50',
  pray: '\u{1F64F}',
};

// first name wins, so thumbsup maps back to +1
const EMOJI_TO_NAME: ReadonlyMap<string, string> = new Map(
  Object.entries(NAME_TO_EMOJI)
    .reverse()
    .map(([name, emoji]): [string, string] => [emoji, name]),
);

/** Mattermost reaction name to the Matrix reaction key. Unknown names render as `:name:`. */
export function reactionToEmoji(name: string): string {
  return Object.hasOwn(NAME_TO_EMOJI, name) ? NAME_TO_EMOJI[name] : `:${name}:`;
}

/** Matrix reaction key to a Mattermost reaction name. */
export function emojiToReaction(emoji: string): string {
  const known = EMOJI_TO_NAME.get(emoji);
  if (known !== undefined) return known;
  if (emoji.length > 2 && emoji.startsWith(':') && emoji.endsWith(':')) {
    return emoji.slice(1, -1);
  }
  return emoji;
}
