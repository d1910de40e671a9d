// ═══════════════════════════════════════════════════════════════════════════════
// EXPORT FORMATTER TESTS
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect } from 'vitest';
import {
  CsvFormatter,
  getFormatter,
  HtmlFormatter,
  JsonFormatter,
  MarkdownFormatter,
  resolveTitle,
  TextFormatter,
  type ExportedDocument,
} from '../formatters.js';
import { discussionUrl, type ExportEntry, type FormatContext } from '../types.js';

const context: FormatContext = {
  documentTitle: 'Saved Stories',
  exportedAt: new Date(Date.UTC(2024, 0, 2, 3, 4, 5)),
  discussionUrl: id => discussionUrl('https://news.ycombinator.com/item?id=%s', id),
};

const single: ExportEntry[] = [{ id: '1', title: 'A', url: 'http://a', savedAtEpochSeconds: 0 }];

function parseDocument(json: string): ExportedDocument {
  const parsed: ExportedDocument = JSON.parse(json);
  return parsed;
}

describe('resolveTitle', () => {
  it('should prefer the display title', () => {
    expect(resolveTitle({ ...single[0], id: '1', displayTitle: 'Shown' })).toBe('Shown');
  });

  it('should fall back to title, then url, then id', () => {
    const base = { id: '7', url: 'http://a', title: 'Own', savedAtEpochSeconds: 0 };

    expect(resolveTitle({ ...base, displayTitle: '' })).toBe('Own');
    expect(resolveTitle({ ...base, title: '' })).toBe('http://a');
    expect(resolveTitle({ ...base, title: '', url: '' })).toBe('7');
  });
});

describe('CsvFormatter', () => {
  it('should produce a header and one row per item', () => {
    expect(new CsvFormatter().format(single, context)).toBe(
      'Title,URL,Hacker News Link,Saved Date\n' +
      '"A",http://a,https://news.ycombinator.com/item?id=1,1970-01-01 00:00'
    );
  });

  it('should double quotes inside titles', () => {
    const csv = new CsvFormatter().format(
      [{ id: '2', title: 'He said "no"', url: 'http://b', savedAtEpochSeconds: 90_061 }],
      context
    );

    expect(csv.split('\n')[1]).toBe('"He said ""no""",http://b,https://news.ycombinator.com/item?id=2,1970-01-02 01:01');
  });
});

describe('CsvFormatter url field', () => {
  it('should quote a url containing a comma', () => {
    const csv = new CsvFormatter().format(
      [{ id: '1', title: 'A', url: 'http://a/x,y', savedAtEpochSeconds: 0 }],
      context
    );

    expect(csv.split('\n')[1]).toBe('"A","http://a/x,y",https://news.ycombinator.com/item?id=1,1970-01-01 00:00');
  });

  it('should double quotes inside a quoted url', () => {
    const csv = new CsvFormatter().format(
      [{ id: '1', title: 'A', url: 'http://a/"q"', savedAtEpochSeconds: 0 }],
      context
    );

    expect(csv.split('\n')[1]).toBe('"A","http://a/""q""",https://news.ycombinator.com/item?id=1,1970-01-01 00:00');
  });
});

describe('TextFormatter', () => {
  it('should number each item', () => {
    expect(new TextFormatter().format(single, context)).toBe([
      '=== Saved Stories ===',
      '',
      '1. A',
      '   URL: http://a',
      '   HN: https://news.ycombinator.com/item?id=1',
      '   Saved: 1970-01-01 00:00',
      '',
    ].join('\n'));
  });
});

describe('HtmlFormatter', () => {
  it('should produce a standalone document', () => {
    const lines = new HtmlFormatter().format(single, context).split('\n');

    expect(lines[0]).toBe('<!DOCTYPE html>');
    expect(lines).toContain('<title>Saved Stories</title>');
    expect(lines).toContain('<h1>Saved Stories</h1>');
    expect(lines).toContain('<div class="title"><a href="http://a">A</a></div>');
    expect(lines).toContain(
      '<a href="https://news.ycombinator.com/item?id=1">HN Discussion</a> | Saved: 1970-01-01 00:00'
    );
    expect(lines[lines.length - 1]).toBe('</body></html>');
  });

  it('should escape markup in titles', () => {
    const lines = new HtmlFormatter().format(
      [{ id: '3', title: `<b>"Tom" & 'Jerry'</b>`, url: 'http://c?x=1&y=2', savedAtEpochSeconds: 0 }],
      context
    ).split('\n');

    expect(lines).toContain(
      '<div class="title"><a href="http://c?x=1&amp;y=2">&lt;b&gt;&quot;Tom&quot; &amp; &#39;Jerry&#39;&lt;/b&gt;</a></div>'
    );
  });
});

describe('MarkdownFormatter', () => {
  it('should produce one section per item', () => {
    expect(new MarkdownFormatter().format(single, context)).toBe([
      '# Saved Stories',
      '',
      '## A',
      '',
      '- **URL:** [Link](http://a)',
      '- **HN:** [Discussion](https://news.ycombinator.com/item?id=1)',
      '- **Saved:** 1970-01-01 00:00',
      '',
      '---',
      '',
    ].join('\n'));
  });

  it('should escape markdown syntax in titles', () => {
    const markdown = new MarkdownFormatter().format(
      [{ id: '4', title: 'a*b_[c]|d\\e', url: 'http://d', savedAtEpochSeconds: 0 }],
      context
    );

    expect(markdown.split('\n')[2]).toBe('## a\\*b\\_\\[c\\]\\|d\\\\e');
  });
});

describe('JsonFormatter', () => {
  it('should export two stories as a valid document', () => {
    const document = parseDocument(new JsonFormatter().format([
      ...single,
      { id: '2', title: 'Say "hi"', url: 'http://b', savedAtEpochSeconds: 3_661 },
    ], context));

    expect(document.exported).toBe('2024-01-02T03:04:05');
    expect(document.stories).toHaveLength(2);
    expect(document.stories[0]).toEqual({
      id: '1',
      title: 'A',
      url: 'http://a',
      hnUrl: 'https://news.ycombinator.com/item?id=1',
      savedAt: '1970-01-01T00:00:00',
    });
    expect(document.stories[1]?.title).toBe('Say "hi"');
    expect(document.stories[1]?.savedAt).toBe('1970-01-01T01:01:01');
  });

  it('should export a single story', () => {
    const document = parseDocument(new JsonFormatter().format(single, context));

    expect(document.stories.map(entry => entry.id)).toEqual(['1']);
  });
});

describe('getFormatter', () => {
  it('should return the formatter for each format', () => {
    expect(getFormatter('csv')).toBeInstanceOf(CsvFormatter);
    expect(getFormatter('txt')).toBeInstanceOf(TextFormatter);
    expect(getFormatter('html')).toBeInstanceOf(HtmlFormatter);
    expect(getFormatter('markdown')).toBeInstanceOf(MarkdownFormatter);
    expect(getFormatter('json')).toBeInstanceOf(JsonFormatter);
  });
});
