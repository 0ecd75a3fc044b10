import type { Publisher } from './publisher';
import type { VersionStore } from './versionStore';

/** `/cleanup` keeps only the newest copy of each part. */
export const MANUAL_CLEANUP_KEEP = 1;

export type CommandContext = {
  store: Pick<VersionStore, 'listProjects' | 'findPart' | 'latestVersion' | 'readChangelog'>;
  publisher: Pick<Publisher, 'listPublished' | 'prune'>;
  authorizedChatId: string;
  startedAt: Date;
};

const HELP_TEXT = [
  'Chip Warden is online.',
  '',
  'Available commands:',
  '/status - Show system status',
  '/cleanup - Clean up old files on the share',
  '/latest <part> - Show the latest version of a part',
  '/help - Show this message'
].join('\n');

export const UNAUTHORIZED_REPLY = 'Unauthorized';

function parseCommand(text: string): { name: string; args: string[] } {
  const [head = '', ...args] = text.trim().split(/\s+/);
  // "/status@SomeBot" addresses a specific bot in group chats
  const name = head.replace(/^\//, '').split('@')[0].toLowerCase();
  return { name, args };
}

async function statusReply(ctx: CommandContext): Promise<string> {
  const published = await ctx.publisher.listPublished();
  const projects = await ctx.store.listProjects();
  return [
    'Chip Warden Status',
    '',
    `Running since: ${ctx.startedAt.toISOString()}`,
    `Files on share: ${published.length}`,
    `Archived projects: ${projects.length}`
  ].join('\n');
}

async function latestReply(ctx: CommandContext, part: string | undefined): Promise<string> {
  if (!part) return 'Usage: /latest <part>';
  const locations = await ctx.store.findPart(part);
  if (locations.length === 0) return `No archived versions found for part ${part}`;
  const lines: string[] = [];
  for (const { project } of locations) {
    const latest = await ctx.store.latestVersion(project, part);
    if (!latest) continue;
    const changelog = await ctx.store.readChangelog(project, part);
    const entry = changelog?.entries.find((candidate) => candidate.version === latest.version);
    lines.push(`${project}: v${latest.version} (${latest.fileName})`);
    if (entry) lines.push(entry.text);
    lines.push('');
  }
  return lines.length ? lines.join('\n').trimEnd() : `No archived versions found for part ${part}`;
}

/**
 * Answers a slash command from `chatId`. Everything except help requires the
 * configured chat. Returns null for text that is not a known command.
 */
export async function handleCommand(ctx: CommandContext, chatId: string, text: string): Promise<string | null> {
  const { name, args } = parseCommand(text);
  if (name === 'start' || name === 'help') return HELP_TEXT;
  if (!['status', 'cleanup', 'latest'].includes(name)) return null;
  if (chatId !== ctx.authorizedChatId) return UNAUTHORIZED_REPLY;

  switch (name) {
    case 'status':
      return statusReply(ctx);
    case 'cleanup': {
      const removed = await ctx.publisher.prune(MANUAL_CLEANUP_KEEP);
      return `Removed ${removed} old file(s) from the share`;
    }
    default:
      return latestReply(ctx, args[0]);
  }
}
