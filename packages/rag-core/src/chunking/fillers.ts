/**
 * FILE PURPOSE: Filler/stopword list loading
 *
 * WHY: The list is a human-edited, version-controlled text file (one entry per
 *      line), kept apart from code so it can be tuned without a release.
 */

import { readFile } from 'node:fs/promises';

/** Parse a line-delimited list. `#` starts a comment; blank lines are skipped. */
export function parseFillerList(content: string): string[] {
  const seen = new Set<string>();
  for (const line of content.split(/\r?\n/)) {
    const entry = line.replace(/#.*$/, '').trim().toLowerCase().replace(/\s+/g, ' ');
    if (entry) seen.add(entry);
  }
  return [...seen];
}

export async function loadFillerList(filePath: string): Promise<string[]> {
  const content = await readFile(filePath, 'utf-8');
  return parseFillerList(content);
}

export function formatFillerList(entries: Iterable<string>, header?: string): string {
  const lines = [...new Set(entries)].sort();
  const prefix = header ? header.split('\n').map((l) => `# ${l}`).join('\n') + '\n' : '';
  return `${prefix}${lines.join('\n')}\n`;
}
