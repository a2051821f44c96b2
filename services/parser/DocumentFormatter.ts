/**
 * Renders a parsed document as the text served to MCP clients.
 * Block order: header, summary, table of contents, content, code examples, related links.
 */

import type { PageDescriptor } from '../../shared/domain/models/PageDescriptor.js';
import type { ParsedDocument } from '../../shared/domain/models/ParsedDocument.js';

export function formatDocument(document: ParsedDocument, page: PageDescriptor): string {
  const lines: string[] = [];

  lines.push(`# ${document.title}`);
  lines.push(`**Category:** ${page.category}`);
  lines.push(`**URL:** ${page.sourceUrl}`);
  lines.push(`**Description:** ${page.description}`);
  lines.push('');

  if (document.summary) {
    lines.push('## Summary', document.summary, '');
  }

  if (document.sections.length > 1) {
    lines.push('## Table of Contents');
    for (const section of document.sections) {
      lines.push(`${'  '.repeat(section.level - 1)}- ${section.title}`);
    }
    lines.push('');
  }

  lines.push('## Content');
  for (const section of document.sections) {
    lines.push(`${'#'.repeat(section.level)} ${section.title}`);
    if (section.body) {
      lines.push(section.body);
    }
    lines.push('');
  }

  if (document.codeBlocks.length > 0) {
    lines.push('## Code Examples');
    document.codeBlocks.forEach((block, index) => {
      const language = block.language || 'text';
      lines.push(`### Example ${index + 1} (${language})`, '```' + language, block.content, '```', '');
    });
  }

  if (document.links.length > 0) {
    lines.push('## Related Links');
    for (const link of document.links) {
      lines.push(`- [${link.text}](${link.target}) (${link.isExternal ? 'External' : 'Internal'})`);
    }
    lines.push('');
  }

  return lines.join('\n');
}
