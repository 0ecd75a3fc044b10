import type { ProgramMetadata } from '../../../shared/src';
import { formatPosted } from './metadata';

export const CHANGELOG_FILE = 'CHANGELOG.md';
export const ENTRIES_MARKER = '<!-- chip-warden:entries -->';

const ENTRY_HEADING = /^## Version (\d+) - (.*)$/;

export type ChangelogEntry = {
  version: number;
  postedTimestamp: string;
  text: string;
};

export type ChangelogDocument = {
  header: string;
  body: string;
};

export function renderHeader(metadata: Pick<ProgramMetadata, 'part' | 'project'>): string {
  return `# ${metadata.part} - Change Log\n\nProject: ${metadata.project}\n\n`;
}

export function renderEntry(metadata: ProgramMetadata, version: number): string {
  return [
    `## Version ${version} - ${metadata.postedTimestamp}`,
    '',
    `- **Setup:** ${metadata.setup}`,
    `- **Machine:** ${metadata.machine}`,
    `- **Operations:** ${metadata.operations}`,
    `- **Tools:** ${metadata.toolCount}`,
    `- **Posted:** ${formatPosted(metadata)}`,
    '',
    ''
  ].join('\n');
}

/**
 * Files written before the entries marker existed carry a `# title`,
 * a `Project:` line and blank lines ahead of the first entry.
 */
function splitLegacy(text: string): ChangelogDocument {
  if (!text.startsWith('#') || text.startsWith('## ')) {
    return { header: '', body: text };
  }
  const lines = text.split('\n');
  let end = 1;
  while (end < lines.length && !lines[end].startsWith('## ')) {
    const line = lines[end];
    end += 1;
    if (line.startsWith('Project:')) break;
  }
  while (end < lines.length && lines[end].trim() === '') end += 1;
  return {
    header: `${lines.slice(0, end).join('\n').trimEnd()}\n\n`,
    body: lines.slice(end).join('\n')
  };
}

export function splitChangelog(text: string): ChangelogDocument {
  const markerAt = text.indexOf(ENTRIES_MARKER);
  if (markerAt < 0) return splitLegacy(text);
  let bodyStart = markerAt + ENTRIES_MARKER.length;
  while (text[bodyStart] === '\n') bodyStart += 1;
  return { header: text.slice(0, markerAt), body: text.slice(bodyStart) };
}

export function joinChangelog(doc: ChangelogDocument): string {
  return `${doc.header}${ENTRIES_MARKER}\n\n${doc.body}`;
}

/** Puts the new entry above all existing ones; existing text is kept as is. */
export function prependEntry(existing: string | null, metadata: ProgramMetadata, version: number): string {
  const current = existing === null ? { header: '', body: '' } : splitChangelog(existing);
  return joinChangelog({
    header: current.header || renderHeader(metadata),
    body: `${renderEntry(metadata, version)}${current.body}`
  });
}

export function parseEntries(text: string): ChangelogEntry[] {
  const { body } = splitChangelog(text);
  const entries: ChangelogEntry[] = [];
  let current: { version: number; postedTimestamp: string; lines: string[] } | null = null;
  const flush = () => {
    if (!current) return;
    entries.push({
      version: current.version,
      postedTimestamp: current.postedTimestamp,
      text: current.lines.join('\n').trimEnd()
    });
  };
  for (const line of body.split('\n')) {
    const heading = ENTRY_HEADING.exec(line);
    if (heading) {
      flush();
      current = { version: Number.parseInt(heading[1], 10), postedTimestamp: heading[2].trim(), lines: [line] };
    } else if (current) {
      current.lines.push(line);
    }
  }
  flush();
  return entries;
}
