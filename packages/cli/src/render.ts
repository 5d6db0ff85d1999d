import type { CLIErrorView } from '@hyperenum/core';

const RED = '\u001B[31m';
const BOLD = '\u001B[1m';
const RESET = '\u001B[0m';
// eslint-disable-next-line no-control-regex
const SGR_SEQUENCE = /\u001B\[[0-9;]*m/g;

/** Greedy word wrap; a word longer than the width gets a line of its own. */
export function wrapText(text: string, width: number): string {
  const lines: string[] = [];
  for (const word of text.split(/\s+/).filter(Boolean)) {
    const last = lines.length - 1;
    const current = lines[last];
    if (current !== undefined && current.length + 1 + word.length <= width) {
      lines[last] = `${current} ${word}`;
    } else {
      lines.push(word);
    }
  }
  return lines.join('\n');
}

/**
 * Error block printed to stderr: a highlighted heading, then whichever of
 * location, cause and workaround the view carries, each wrapped to the
 * terminal width.
 */
export function renderCLIView(view: CLIErrorView): string {
  const width = view.terminalWidth || 80;
  const heading = `❌ ${view.title}`;
  const sections = [
    view.location && `📍 ${view.location}`,
    view.cause && `Cause: ${view.cause}`,
    view.workaround && `💡 Workaround: ${view.workaround}`,
  ].filter((section): section is string => Boolean(section));

  return [
    view.colors ? `${RED}${BOLD}${heading}${RESET}` : heading,
    ...sections.map((section) => wrapText(section, width)),
  ].join('\n');
}

export function stripAnsi(input: string): string {
  return input.replace(SGR_SEQUENCE, '');
}
