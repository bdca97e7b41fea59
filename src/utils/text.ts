import { parseHTML } from 'linkedom';

// テキスト分割の最大サイズ（TTSの1リクエストあたりの入力上限に合わせる）
const DEFAULT_MAX_CHUNK_SIZE = 1400;

export interface SplitOptions {
  maxChunkSize?: number;
}

// テキストを適切な長さのチャンクに分割
export function splitText(text: string, options: SplitOptions = {}): string[] {
  const maxChunkSize = options.maxChunkSize ?? DEFAULT_MAX_CHUNK_SIZE;

  if (!text || text.trim().length === 0) {
    return [];
  }

  // 段落で分割
  const paragraphs = text.split('\n\n').filter((p) => p.trim().length > 0);
  const chunks: string[] = [];
  let currentChunk = '';

  for (const paragraph of paragraphs) {
    // 段落が単独でチャンクサイズを超える場合は文単位で分割
    if (paragraph.length > maxChunkSize) {
      const sentences = paragraph.split(/(?<=[。．！？.!?])\s*/).filter((s) => s.trim().length > 0);
      for (const sentence of sentences) {
        if (currentChunk.length + sentence.length + 1 > maxChunkSize) {
          if (currentChunk.length > 0) {
            chunks.push(currentChunk.trim());
            currentChunk = '';
          }
          if (sentence.length > maxChunkSize) {
            // 句読点のない長文は文字数で切る
            for (let i = 0; i < sentence.length; i += maxChunkSize) {
              chunks.push(sentence.slice(i, i + maxChunkSize).trim());
            }
          } else {
            currentChunk = sentence;
          }
        } else {
          currentChunk += (currentChunk ? ' ' : '') + sentence;
        }
      }
    } else if (currentChunk.length + paragraph.length + 2 > maxChunkSize) {
      if (currentChunk.length > 0) {
        chunks.push(currentChunk.trim());
      }
      currentChunk = paragraph;
    } else {
      currentChunk += (currentChunk ? '\n\n' : '') + paragraph;
    }
  }

  if (currentChunk.length > 0) {
    chunks.push(currentChunk.trim());
  }

  return chunks.filter((c) => c.length > 0);
}

// ブロック要素の終わりで段落を区切る
const BLOCK_END = /<\/(p|div|h[1-6]|li|blockquote|pre|tr|section|article)>|<br\s*\/?>/gi;

// HTMLをプレーンテキストに変換（段落は空行で区切る）
export function htmlToText(html: string): string {
  const marked = html.replace(BLOCK_END, (tag) => `${tag}\n\n`);
  const { document } = parseHTML(`<!DOCTYPE html><html><body>${marked}</body></html>`);

  for (const node of document.querySelectorAll('script, style, noscript')) {
    node.remove();
  }

  const text = document.body.textContent ?? '';
  return normalizeWhitespace(text);
}

// 行内の空白をまとめ、段落区切りは空行1つにそろえる
export function normalizeWhitespace(text: string): string {
  return text
    .replace(/\u00a0/g, ' ')
    .split(/\n\s*\n/)
    .map((paragraph) => paragraph.replace(/\s+/g, ' ').trim())
    .filter((paragraph) => paragraph.length > 0)
    .join('\n\n');
}

// HTML特殊文字のエスケープ
export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#039;');
}
