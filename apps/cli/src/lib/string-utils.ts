/**
 * String Utilities - Plain-text tables for CLI output
 */

import chalk from 'chalk';

// Approximate terminal width: most emoji render two cells wide
function getDisplayWidth(str: string): number {
  const emojiRegex = /[\u{1F600}-\u{1F64F}]|[\u{1F300}-\u{1F5FF}]|[\u{1F680}-\u{1F6FF}]|[\u{2600}-\u{26FF}]|[\u{2700}-\u{27BF}]|[\u{1F900}-\u{1F9FF}]/gu;
  const emojis = str.match(emojiRegex) || [];
  return str.length + emojis.length;
}

export type TableRow = Record<string, string>;

export interface TableOptions {
  /** Bold headers */
  colors?: boolean;
  padding?: number;
}

/**
 * Render rows as a box-drawn table. Columns appear in the given order;
 * missing cells render empty.
 */
export function createStringTable(data: readonly TableRow[], columns: readonly string[], options: TableOptions = {}): string {
  if (data.length === 0) {
    return 'No data to display\n';
  }

  const { colors = true, padding = 1 } = options;
  const header = (text: string) => (colors ? chalk.bold(text) : text);

  const widths = columns.map(col =>
    Math.max(getDisplayWidth(col), ...data.map(row => getDisplayWidth(row[col] ?? '')))
  );
  const pad = (str: string, width: number) => str + ' '.repeat(Math.max(0, width - getDisplayWidth(str)));
  const spacer = ' '.repeat(padding);
  const rule = (left: string, join: string, right: string) =>
    left + widths.map(width => '─'.repeat(width + padding * 2)).join(join) + right + '\n';

  let output = rule('┌', '┬', '┐');
  output += '│' + columns.map((col, i) => `${spacer}${header(pad(col, widths[i] ?? 0))}${spacer}`).join('│') + '│\n';
  output += rule('├', '┼', '┤');
  for (const row of data) {
    output += '│' + columns.map((col, i) => `${spacer}${pad(row[col] ?? '', widths[i] ?? 0)}${spacer}`).join('│') + '│\n';
  }
  output += rule('└', '┴', '┘');

  return output;
}
