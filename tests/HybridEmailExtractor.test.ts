import { describe, expect, it } from 'vitest';

import { createConfig } from '../src/config.js';
import { EmailExtractor } from '../src/extractors/EmailExtractor.js';
import { HybridEmailExtractor } from '../src/extractors/HybridEmailExtractor.js';
import { extractPageInfo, MAX_EXTRACTED_TEXT, visibleText } from '../src/extractors/PageInfoExtractor.js';
import { RunStats } from '../src/pipeline/RunStats.js';

import { FakeRenderer } from './helpers/fakes.js';

describe('PageInfoExtractor', () => {
  it('reads title, meta tags and visible text', () => {
    const html = `<html><head><title> Acme   Corp </title>
      <meta name="Description" content="Tools  for all">
      <meta name="keywords" content="tools, hardware"></head>
      <body><h1>Welcome</h1><p>Call us</p><script>var x = 1;</script></body></html>`;
    expect(extractPageInfo(html)).toEqual({
      title: 'Acme Corp',
      metaDescription: 'Tools for all',
      metaKeywords: 'tools, hardware',
      extractedText: 'Welcome Call us'
    });
  });

  it('caps the extracted text', () => {
    const info = extractPageInfo(`<p>${'a'.repeat(MAX_EXTRACTED_TEXT + 50)}</p>`);
    expect(info.extractedText).toHaveLength(MAX_EXTRACTED_TEXT);
    expect(info.title).toBe('');
  });

  it('separates adjacent elements with a space', () => {
    expect(visibleText('<p>one</p><p>two</p><style>p{}</style>')).toBe('one two');
  });
});

describe('HybridEmailExtractor', () => {
  const extractor = new EmailExtractor(createConfig());
  const url = 'https://acme.example/contact';
  const shell = '<body><div id="app">Loading</div></body>';

  it('skips rendering when the static pass finds addresses', async () => {
    const renderer = new FakeRenderer();
    const hybrid = new HybridEmailExtractor(extractor, { renderer });
    const result = await hybrid.extractPage(url, '<p>info@acme.example</p>');
    expect(result.rendered).toBe(false);
    expect(result.emails.map((email) => email.address)).toEqual(['info@acme.example']);
    expect(renderer.rendered).toEqual([]);
  });

  it('renders once per URL when the static pass finds nothing', async () => {
    const renderer = new FakeRenderer({ [url]: '<a href="mailto:info@acme.example">Write</a>' });
    const stats = new RunStats();
    const hybrid = new HybridEmailExtractor(extractor, { renderer, stats });

    const first = await hybrid.extractPage(url, shell);
    const second = await hybrid.extractPage(url, shell);

    expect(first.rendered).toBe(true);
    expect(first.emails.map((email) => email.address)).toEqual(['info@acme.example']);
    expect(second).toEqual(first);
    expect(renderer.rendered).toEqual([url]);
    expect(stats.snapshot().counters.render_fallbacks).toBe(1);
  });

  it('does not render pages without visible text', async () => {
    const renderer = new FakeRenderer();
    const hybrid = new HybridEmailExtractor(extractor, { renderer });
    expect(await hybrid.extractPage(url, '<script>window.app()</script>')).toEqual({ emails: [], rendered: false });
    expect(renderer.rendered).toEqual([]);
  });

  it('returns nothing when rendering fails', async () => {
    const stats = new RunStats();
    const hybrid = new HybridEmailExtractor(extractor, { renderer: new FakeRenderer(), stats });
    expect(await hybrid.extractPage(url, shell)).toEqual({ emails: [], rendered: false });
    expect(stats.snapshot().counters.render_errors).toBe(1);
  });

  it('works without a renderer', async () => {
    const hybrid = new HybridEmailExtractor(extractor);
    expect(await hybrid.extractPage(url, shell)).toEqual({ emails: [], rendered: false });
  });
});
