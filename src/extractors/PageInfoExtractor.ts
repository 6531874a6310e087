import { load, type CheerioAPI } from 'cheerio';

export const MAX_EXTRACTED_TEXT = 1_000;

export interface PageInfo {
  title: string;
  metaDescription: string;
  metaKeywords: string;
  extractedText: string;
}

function textOf($: CheerioAPI): string {
  $('script, style, noscript, template').remove();
  $('body *').prepend(' ').append(' ');
  return $('body').text().replace(/\s+/g, ' ').trim();
}

/** Visible page text, one space between text nodes. */
export function visibleText(html: string): string {
  return textOf(load(html));
}

function metaContent($: CheerioAPI, name: string): string {
  return ($(`meta[name="${name}" i]`).first().attr('content') ?? '').replace(/\s+/g, ' ').trim();
}

export function extractPageInfo(html: string): PageInfo {
  const $ = load(html);
  const title = $('title').first().text().replace(/\s+/g, ' ').trim();
  const metaDescription = metaContent($, 'description');
  const metaKeywords = metaContent($, 'keywords');
  return {
    title,
    metaDescription,
    metaKeywords,
    extractedText: textOf($).slice(0, MAX_EXTRACTED_TEXT)
  };
}
