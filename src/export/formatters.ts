// ═══════════════════════════════════════════════════════════════════════════════
// EXPORT FORMATTERS — Saved Stories to CSV, Text, HTML, Markdown, JSON
// ═══════════════════════════════════════════════════════════════════════════════

import { formatLocalDateTime, formatSavedDate, fromEpochSeconds } from './dates.js';
import type { ExportEntry, ExportFormat, FormatContext } from './types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// BASE FORMATTER INTERFACE
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Pure serializer. Callers only pass non-empty sequences; order is kept.
 */
export interface ExportFormatter {
  format(entries: readonly ExportEntry[], context: FormatContext): string;
}

export function resolveTitle(entry: ExportEntry): string {
  return entry.displayTitle || entry.title || entry.url || entry.id;
}

function savedDate(entry: ExportEntry): string {
  return formatSavedDate(fromEpochSeconds(entry.savedAtEpochSeconds));
}

// ─────────────────────────────────────────────────────────────────────────────────
// CSV FORMATTER
// ─────────────────────────────────────────────────────────────────────────────────

export const CSV_HEADER = 'Title,URL,Hacker News Link,Saved Date';

export class CsvFormatter implements ExportFormatter {
  format(entries: readonly ExportEntry[], context: FormatContext): string {
    const lines: string[] = [CSV_HEADER];

    for (const entry of entries) {
      lines.push([
        this.quote(resolveTitle(entry)),
        this.escapeField(entry.url),
        context.discussionUrl(entry.id),
        savedDate(entry),
      ].join(','));
    }

    return lines.join('\n');
  }

  private quote(value: string): string {
    return `"${value.replace(/"/g, '""')}"`;
  }

  private escapeField(value: string): string {
    return /[",\r\n]/.test(value) ? this.quote(value) : value;
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// TEXT FORMATTER
// ─────────────────────────────────────────────────────────────────────────────────

export class TextFormatter implements ExportFormatter {
  format(entries: readonly ExportEntry[], context: FormatContext): string {
    const lines: string[] = [];

    lines.push(`=== ${context.documentTitle} ===`);
    lines.push('');

    entries.forEach((entry, index) => {
      lines.push(`${index + 1}. ${resolveTitle(entry)}`);
      lines.push(`   URL: ${entry.url}`);
      lines.push(`   HN: ${context.discussionUrl(entry.id)}`);
      lines.push(`   Saved: ${savedDate(entry)}`);
      lines.push('');
    });

    return lines.join('\n');
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// HTML FORMATTER
// ─────────────────────────────────────────────────────────────────────────────────

const HTML_STYLE = [
  '<style>body{font-family:Arial,sans-serif;max-width:800px;margin:0 auto;padding:20px}',
  '.story{margin-bottom:20px;padding:15px;border:1px solid #ddd;border-radius:8px}',
  '.title{font-size:18px;font-weight:bold;margin-bottom:8px}',
  '.meta{color:#666;font-size:14px}</style></head><body>',
];

export class HtmlFormatter implements ExportFormatter {
  format(entries: readonly ExportEntry[], context: FormatContext): string {
    const lines: string[] = [];
    const documentTitle = this.escapeHtml(context.documentTitle);

    lines.push('<!DOCTYPE html>');
    lines.push('<html><head><meta charset="UTF-8">');
    lines.push(`<title>${documentTitle}</title>`);
    lines.push(...HTML_STYLE);
    lines.push(`<h1>${documentTitle}</h1>`);

    for (const entry of entries) {
      lines.push('<div class="story">');
      lines.push(
        `<div class="title"><a href="${this.escapeHtml(entry.url)}">${this.escapeHtml(resolveTitle(entry))}</a></div>`
      );
      lines.push('<div class="meta">');
      lines.push(
        `<a href="${this.escapeHtml(context.discussionUrl(entry.id))}">HN Discussion</a> | Saved: ${savedDate(entry)}`
      );
      lines.push('</div></div>');
    }

    lines.push('</body></html>');
    return lines.join('\n');
  }

  private escapeHtml(text: string): string {
    return text
      .replace(/&/g, '&amp;')
      .replace(/</g, '&lt;')
      .replace(/>/g, '&gt;')
      .replace(/"/g, '&quot;')
      .replace(/'/g, '&#39;');
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// MARKDOWN FORMATTER
// ─────────────────────────────────────────────────────────────────────────────────

export class MarkdownFormatter implements ExportFormatter {
  format(entries: readonly ExportEntry[], context: FormatContext): string {
    const lines: string[] = [];

    lines.push(`# ${context.documentTitle}`);
    lines.push('');

    for (const entry of entries) {
      lines.push(`## ${this.escapeMarkdown(resolveTitle(entry))}`);
      lines.push('');
      lines.push(`- **URL:** [Link](${entry.url})`);
      lines.push(`- **HN:** [Discussion](${context.discussionUrl(entry.id)})`);
      lines.push(`- **Saved:** ${savedDate(entry)}`);
      lines.push('');
      lines.push('---');
      lines.push('');
    }

    return lines.join('\n');
  }

  private escapeMarkdown(text: string): string {
    return text
      .replace(/\\/g, '\\\\')
      .replace(/\*/g, '\\*')
      .replace(/_/g, '\\_')
      .replace(/\[/g, '\\[')
      .replace(/\]/g, '\\]')
      .replace(/\|/g, '\\|');
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// JSON FORMATTER
// ─────────────────────────────────────────────────────────────────────────────────

export interface ExportedStory {
  id: string;
  title: string;
  url: string;
  hnUrl: string;
  savedAt: string;
}

export interface ExportedDocument {
  exported: string;
  stories: ExportedStory[];
}

export class JsonFormatter implements ExportFormatter {
  format(entries: readonly ExportEntry[], context: FormatContext): string {
    const document: ExportedDocument = {
      exported: formatLocalDateTime(context.exportedAt),
      stories: entries.map(entry => ({
        id: entry.id,
        title: resolveTitle(entry),
        url: entry.url,
        hnUrl: context.discussionUrl(entry.id),
        savedAt: formatLocalDateTime(fromEpochSeconds(entry.savedAtEpochSeconds)),
      })),
    };

    return JSON.stringify(document, null, 2);
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// FORMATTER FACTORY
// ─────────────────────────────────────────────────────────────────────────────────

export function getFormatter(format: ExportFormat): ExportFormatter {
  switch (format) {
    case 'csv':
      return new CsvFormatter();
    case 'txt':
      return new TextFormatter();
    case 'html':
      return new HtmlFormatter();
    case 'markdown':
      return new MarkdownFormatter();
    case 'json':
      return new JsonFormatter();
  }
}
