import { MATRIX_HTML_FORMAT, type MatrixMessageContent } from '../model/Message.js';
import { decodeEntities } from './html.js';
import { PlaceholderStore, runRules, type RewriteRule } from './rules.js';

const LIST_ITEM = /<li[^>]*>([\s\S]*?)<\/li>/gi;

function listItems(inner: string): string[] {
  return [...inner.matchAll(LIST_ITEM)].map((m) => m[1].trim());
}

function fencedBlock(lang: string, body: string): string {
  const code = decodeEntities(body).replace(/\n$/, '');
  return `\`\`\`${lang}\n${code}\n\`\`\``;
}

function quoteLines(inner: string, code: PlaceholderStore): string {
  const lines = inner
    .replace(/<br\s*\/?>/gi, '\n')
    .replace(/<\/p>/gi, '\n')
    .replace(/<p[^>]*>/gi, '')
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line !== '');
  // code kept in placeholders spans several lines once restored
  return lines.map((line) => `> ${code.map(line, (value) => value.replace(/\n/g, '\n> '))}`).join('\n');
}

/**
 * Rules for Matrix HTML to Mattermost markdown, in application order.
 * Code regions are swapped for placeholders first and restored last.
 */
function buildRules(code: PlaceholderStore): RewriteRule[] {
  return [
    {
      name: 'reply-fallback',
      pattern: /<mx-reply>[\s\S]*?<\/mx-reply>/gi,
      rewrite: () => '',
    },
    {
      name: 'code-block',
      pattern:
        /<pre[^>]*>\s*<code(?:\s+class="language-([\w+#.-]+)")?[^>]*>([\s\S]*?)<\/code>\s*<\/pre>/gi,
      rewrite: (m) => `\n${code.protect(fencedBlock(m[1] ?? '', m[2]))}\n`,
    },
    {
      name: 'preformatted',
      pattern: /<pre[^>]*>([\s\S]*?)<\/pre>/gi,
      rewrite: (m) => `\n${code.protect(fencedBlock('', m[1]))}\n`,
    },
    {
      name: 'inline-code',
      pattern: /<code[^>]*>([\s\S]*?)<\/code>/gi,
      rewrite: (m) => code.protect(`\`${decodeEntities(m[1])}\``),
    },
    {
      name: 'bold',
      pattern: /<(strong|b)(?:\s[^>]*)?>([\s\S]*?)<\/\1>/gi,
      rewrite: (m) => `**${m[2]}**`,
    },
    {
      name: 'italic',
      pattern: /<(em|i)(?:\s[^>]*)?>([\s\S]*?)<\/\1>/gi,
      rewrite: (m) => `_${m[2]}_`,
    },
    {
      name: 'strikethrough',
      pattern: /<(del|s|strike)(?:\s[^>]*)?>([\s\S]*?)<\/\1>/gi,
      rewrite: (m) => `~~${m[2]}~~`,
    },
    {
      name: 'link',
      pattern: /<a\s[^>]*?href="([^"]*)"[^>]*>([\s\S]*?)<\/a>/gi,
      rewrite: (m) => (m[2].trim() === '' ? m[1] : `[${m[2]}](${m[1]})`),
    },
    {
      name: 'heading',
      pattern: /<h([1-6])[^>]*>([\s\S]*?)<\/h\1>/gi,
      rewrite: (m) => `\n\n${'#'.repeat(Number(m[1]))} ${m[2].trim()}\n\n`,
    },
    {
      name: 'blockquote',
      pattern: /<blockquote[^>]*>([\s\S]*?)<\/blockquote>/gi,
      rewrite: (m) => `\n\n${quoteLines(m[1], code)}\n\n`,
    },
    {
      name: 'unordered-list',
      pattern: /<ul[^>]*>([\s\S]*?)<\/ul>/gi,
      rewrite: (m) => `\n\n${listItems(m[1]).map((item) => `- ${item}`).join('\n')}\n\n`,
    },
    {
      name: 'ordered-list',
      pattern: /<ol([^>]*)>([\s\S]*?)<\/ol>/gi,
      rewrite: (m) => {
        const start = /\bstart="(\d+)"/i.exec(m[1]);
        const first = start ? Number(start[1]) : 1;
        const items = listItems(m[2]).map((item, i) => `${first + i}. ${item}`);
        return `\n\n${items.join('\n')}\n\n`;
      },
    },
    {
      name: 'paragraph',
      pattern: /<p(?:\s[^>]*)?>([\s\S]*?)<\/p>/gi,
      rewrite: (m) => `${m[1]}\n\n`,
    },
    { name: 'line-break', pattern: /<br\s*\/?>/gi, rewrite: () => '\n' },
    { name: 'strip-tags', pattern: /<[^>]+>/g, rewrite: () => '' },
    { name: 'blank-lines', pattern: /\n{3,}/g, rewrite: () => '\n\n' },
  ];
}

/**
 * Matrix message content to the text of a Mattermost post. Content without
 * an HTML body passes through as its plain body.
 */
export function matrixToMattermost(content: MatrixMessageContent): string {
  if (content.format !== MATRIX_HTML_FORMAT || !content.formatted_body) {
    return content.body;
  }

  const code = new PlaceholderStore('C');
  const converted = decodeEntities(runRules(content.formatted_body, buildRules(code)));
  return code.restore(converted).trim();
}
