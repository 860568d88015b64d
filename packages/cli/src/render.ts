import type { CLIErrorView } from '@semregex/core';

const RED = '\u001B[31m';
const BOLD = '\u001B[1m';
const RESET = '\u001B[0m';

/** Greedy word wrap; a word longer than `width` keeps its own line. */
function wrapText(text: string, width: number): string[] {
  const lines: string[] = [];
  let line = '';
  for (const word of text.split(/\s+/)) {
    const next = line ? `${line} ${word}` : word;
    if (next.length > width && line) {
      lines.push(line);
      line = word;
    } else {
      line = next;
    }
  }
  if (line) lines.push(line);
  return lines;
}

/**
 * Render a presenter view as terminal text: the title, then one wrapped
 * section per populated field.
 */
export function renderCLIView(view: CLIErrorView): string {
  const width = view.terminalWidth || 80;
  const title = `❌ ${view.title}`;

  const sections: Array<string | undefined> = [
    view.input && `Input: ${view.input}`,
    view.location && `📍 ${view.location}`,
    view.excerpt && `Excerpt: ${view.excerpt}`,
    view.workaround && `💡 Workaround: ${view.workaround}`,
  ];

  return [
    view.colors ? `${RED}${BOLD}${title}${RESET}` : title,
    ...sections.flatMap((section) => (section ? wrapText(section, width) : [])),
  ].join('\n');
}
