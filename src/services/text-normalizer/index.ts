import * as cheerio from 'cheerio';
import { logger } from '../../lib/logger.js';

const NOISE_SELECTOR = 'script, style, head, nav, noscript, template';

export function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

/**
 * Reduce an HTML document to readable text. Footer content is kept; element
 * boundaries become spaces so adjacent blocks do not run together. Decoded
 * entities can spell out markup again, so passes repeat until the text is
 * stable and `toText(toText(x))` equals `toText(x)`.
 */
export function toText(html: string): string {
  let current = renderText(html);
  for (;;) {
    const next = renderText(current);
    if (next === current) return current;
    current = next;
  }
}

function renderText(html: string): string {
  if (!html) return '';

  // Nothing to parse or decode
  if (!/[<&]/.test(html)) return collapseWhitespace(html);

  try {
    const $ = cheerio.load(html);
    $(NOISE_SELECTOR).remove();
    $('body *').before(' ').after(' ');
    return collapseWhitespace($.root().text());
  } catch (error) {
    logger.warn({ error: String(error) }, 'HTML parse failed, stripping tags instead');
    return stripMarkup(html);
  }
}

function stripMarkup(html: string): string {
  return collapseWhitespace(
    html
      .replace(/<(script|style|head|nav|noscript|template)\b[^>]*>[\s\S]*?<\/\1\s*>/gi, ' ')
      .replace(/<[^>]*>/g, ' '),
  );
}
