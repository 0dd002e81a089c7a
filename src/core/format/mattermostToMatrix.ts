import type { ParsedMessage } from '../model/Message.js';
import { escapeHtml } from './html.js';
import {
  PLACEHOLDER_CLOSE,
  PLACEHOLDER_OPEN,
  PlaceholderStore,
  runRules,
  type RewriteRule,
} from './rules.js';

// any of these means the text needs an HTML body at all
const MARKUP_HINTS: readonly RegExp[] = [
  /\*\*\S[\s\S]*?\*\*/,
  /(?<![\w*])\*[^\s*][^*\n]*\*(?![\w*])/,
  /(?<![\w\\])_\S[^_\n]*_(?!\w)/,
  /~~\S[\s\S]*?~~/,
  /`[^`\n]+`/,
  /```/,
  /\[[^\]]+\]\([^)\s]+\)/,
  /^#{1,6}\s+\S/m,
  /^>/m,
  /^\s*[-*+]\s+\S/m,
  /^\s*\d+\.\s+\S/m,
];

const FENCED_CODE = /```(?:([\w+#.-]+)?[^\S\n]*\n)?([\s\S]*?)```/g;
const QUOTE_LINE = /^>\s?(.*)$/;
const HEADING_LINE = /^(#{1,6})\s+(.+)$/;
const BULLET_LINE = /^\s*[-*+]\s+(.+)$/;
const NUMBERED_LINE = /^\s*(\d+)\.\s+(.+)$/;

const SAFE_LINK = /^(https?:\/\/|mailto:)/i;

const CODE_TOKEN_LINE = new RegExp(`^\\s*(${PLACEHOLDER_OPEN}C\\d+${PLACEHOLDER_CLOSE})\\s*$`);

type ListKind = 'ul' | 'ol';

/** Top-level block of a post. Text fields hold raw, unescaped markdown. */
type Block =
  | { kind: 'paragraph'; lines: string[] }
  | { kind: 'quote'; lines: string[] }
  | { kind: 'list'; list: ListKind; start: number; items: string[] }
  | { kind: 'heading'; level: number; text: string }
  | { kind: 'code'; token: string };

/**
 * Line pass over the raw text. Quote markers are read here, before `>` is
 * escaped to `&gt;`. A blank line ends the current block; a `>` line with
 * nothing after it stays inside its quote.
 */
function parseBlocks(text: string): Block[] {
  const blocks: Block[] = [];
  let joinable = false;

  for (const line of text.split('\n')) {
    const last = joinable ? blocks.at(-1) : undefined;
    joinable = true;

    const quoted = QUOTE_LINE.exec(line);
    if (quoted) {
      if (last?.kind === 'quote') last.lines.push(quoted[1]);
      else blocks.push({ kind: 'quote', lines: [quoted[1]] });
      continue;
    }
    if (line.trim() === '') {
      joinable = false;
      continue;
    }
    const code = CODE_TOKEN_LINE.exec(line);
    if (code) {
      blocks.push({ kind: 'code', token: code[1] });
      continue;
    }
    const heading = HEADING_LINE.exec(line);
    if (heading) {
      blocks.push({ kind: 'heading', level: heading[1].length, text: heading[2].trim() });
      continue;
    }
    const bullet = BULLET_LINE.exec(line);
    const numbered = bullet ? null : NUMBERED_LINE.exec(line);
    if (bullet || numbered) {
      const list: ListKind = bullet ? 'ul' : 'ol';
      const item = bullet ? bullet[1] : (numbered?.[2] ?? '');
      if (last?.kind === 'list' && last.list === list) {
        last.items.push(item);
      } else {
        blocks.push({ kind: 'list', list, start: numbered ? Number(numbered[1]) : 1, items: [item] });
      }
      continue;
    }
    if (last?.kind === 'paragraph') last.lines.push(line);
    else blocks.push({ kind: 'paragraph', lines: [line] });
  }
  return blocks;
}

function inlineRules(inline: PlaceholderStore): RewriteRule[] {
  return [
    {
      name: 'inline-code',
      pattern: /`([^`\n]+)`/g,
      rewrite: (m) => inline.protect(`<code>${m[1]}</code>`),
    },
    {
      name: 'link',
      pattern: /\[([^\]]+)\]\(([^)\s]+)\)/g,
      rewrite: (m) =>
        SAFE_LINK.test(m[2]) ? inline.protect(`<a href="${m[2]}">${m[1]}</a>`) : m[1],
    },
    {
      name: 'bold',
      pattern: /\*\*(?=\S)([\s\S]*?\S)\*\*/g,
      rewrite: (m) => `<strong>${m[1]}</strong>`,
    },
    {
      name: 'italic-underscore',
      pattern: /(?<![\w\\])_(?=\S)([^_\n]*?\S)_(?!\w)/g,
      rewrite: (m) => `<em>${m[1]}</em>`,
    },
    {
      name: 'italic-star',
      pattern: /(?<![\w*])\*(?=[^\s*])([^*\n]*?[^\s*])\*(?![\w*])/g,
      rewrite: (m) => `<em>${m[1]}</em>`,
    },
    {
      name: 'strikethrough',
      pattern: /~~(?=\S)([\s\S]*?\S)~~/g,
      rewrite: (m) => `<del>${m[1]}</del>`,
    },
  ];
}

function renderCode(lang: string, code: string): string {
  const cls = lang ? ` class="language-${escapeHtml(lang)}"` : '';
  return `<pre><code${cls}>${escapeHtml(code)}</code></pre>`;
}

function renderBlocks(blocks: readonly Block[], rules: readonly RewriteRule[]): string {
  const inline = (text: string) => runRules(escapeHtml(text), rules).replace(/\n/g, '<br/>');
  // several paragraphs get <p> each; a lone one stays bare
  const wrap = blocks.filter((block) => block.kind === 'paragraph').length > 1;

  return blocks
    .map((block) => {
      switch (block.kind) {
        case 'paragraph': {
          const body = inline(block.lines.join('\n'));
          return wrap ? `<p>${body}</p>` : body;
        }
        case 'quote': {
          const paras = block.lines
            .join('\n')
            .split(/\n[^\S\n]*\n/)
            .map((para) => para.replace(/^\n+|\n+$/g, ''))
            .filter((para) => para.trim() !== '');
          const body =
            paras.length > 1 ? paras.map((para) => `<p>${inline(para)}</p>`).join('') : inline(paras.join(''));
          return `<blockquote>${body}</blockquote>`;
        }
        case 'list': {
          const open = block.list === 'ol' && block.start !== 1 ? `<ol start="${block.start}">` : `<${block.list}>`;
          return `${open}${block.items.map((item) => `<li>${inline(item)}</li>`).join('')}</${block.list}>`;
        }
        case 'heading':
          return `<h${block.level}>${inline(block.text)}</h${block.level}>`;
        case 'code':
          return block.token;
      }
    })
    .join('');
}

/**
 * Mattermost markdown to a Matrix message body. Plain text skips the HTML
 * pipeline entirely; otherwise `richBody` holds the HTML rendering and
 * `plainBody` keeps the original text.
 */
export function mattermostToMatrix(text: string): ParsedMessage {
  if (!MARKUP_HINTS.some((hint) => hint.test(text))) {
    return { plainBody: text, hasRichFormat: false };
  }

  const code = new PlaceholderStore('C');
  const withoutCode = text.replace(
    FENCED_CODE,
    (_block: string, lang: string | undefined, body: string) => code.protect(renderCode(lang ?? '', body)),
  );

  const inline = new PlaceholderStore('I');
  const html = renderBlocks(parseBlocks(withoutCode), inlineRules(inline));

  const richBody = code.restore(inline.restore(html)).trim();
  return { plainBody: text, hasRichFormat: true, richBody };
}
