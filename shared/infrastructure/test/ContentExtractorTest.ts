import { describe, expect, it } from 'vitest';
import { JSDOM } from 'jsdom';
import {
  classifyElement,
  collapseBlankLines,
  extractContent,
  findContentRoot,
  renderBlock
} from '../ContentExtractor.js';

const PAGE_URL = 'https://docs.example.com/page';

describe('extractContent', () => {
  it('linearizes headings and paragraphs inside <main>', () => {
    const html = '<html><head><title> Guide </title></head><body><nav><p>Skip me</p></nav>'
      + '<main><h1>Intro</h1><p>Hello   world</p></main></body></html>';

    expect(extractContent(html, PAGE_URL)).toEqual({
      title: 'Guide',
      content: '# Intro\n\nHello world'
    });
  });

  it('falls back to the body and renders list items', () => {
    const html = '<html><body><h2>Setup</h2><ul><li>One</li><li> Two </li><li></li></ul></body></html>';

    expect(extractContent(html, PAGE_URL)).toEqual({
      title: 'Untitled',
      content: '## Setup\n\n- One\n- Two'
    });
  });

  it('emits a fenced block for both <pre> and its inner <code>', () => {
    const html = '<main><pre><code class="language-ts">const x = 1;</code></pre></main>';

    expect(extractContent(html, PAGE_URL).content).toBe('```ts\nconst x = 1;\n```\n\n```ts\nconst x = 1;\n```');
  });

  it('keeps an empty <title> as an empty title', () => {
    expect(extractContent('<html><head><title>  </title></head><body><p>x</p></body></html>', PAGE_URL).title).toBe('');
  });

  it('prefers .content over article', () => {
    const html = '<body><article><p>A</p></article><div class="content"><p>B</p></div></body>';

    expect(extractContent(html, PAGE_URL).content).toBe('B');
  });

  it('returns empty content for a page with nothing recognised', () => {
    expect(extractContent('<html><body><div><span>x</span></div></body></html>', PAGE_URL)).toEqual({
      title: 'Untitled',
      content: ''
    });
  });
});

describe('classifyElement', () => {
  const document = new JSDOM('<body><h3>  Deep   title </h3><span>ignored</span><code class="lang-bash">ls</code></body>').window.document;

  it('classifies headings with their level', () => {
    const heading = document.querySelector('h3');
    expect(heading && classifyElement(heading)).toEqual({ kind: 'heading', level: 3, text: 'Deep title' });
  });

  it('reads the language from a lang- class', () => {
    const code = document.querySelector('code');
    expect(code && classifyElement(code)).toEqual({ kind: 'code', language: 'bash', text: 'ls' });
  });

  it('ignores other elements', () => {
    const span = document.querySelector('span');
    expect(span && classifyElement(span)).toBeNull();
  });
});

describe('renderBlock', () => {
  it('drops empty list items but keeps the separator', () => {
    expect(renderBlock({ kind: 'list', items: ['', 'x'] })).toEqual(['- x', '']);
  });

  it('renders nothing for an empty heading', () => {
    expect(renderBlock({ kind: 'heading', level: 2, text: '' })).toEqual([]);
  });

  it('renders an unlabelled fence when no language is known', () => {
    expect(renderBlock({ kind: 'code', text: 'echo hi' })).toEqual(['```', 'echo hi', '```', '']);
  });
});

describe('collapseBlankLines', () => {
  it('keeps at most one blank line in a row and trims the ends', () => {
    expect(collapseBlankLines(['', 'a', '', '  ', 'b', ''])).toBe('a\n\nb');
  });
});

describe('findContentRoot', () => {
  it('returns the body when no content selector matches', () => {
    const document = new JSDOM('<body><p>plain</p></body>').window.document;
    expect(findContentRoot(document)).toBe(document.body);
  });
});
