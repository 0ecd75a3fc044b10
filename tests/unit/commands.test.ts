import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('../../packages/agent/src/logger', () => ({
  logger: { trace: vi.fn(), debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn(), fatal: vi.fn() }
}));

import type { ProgramMetadata } from '../../packages/shared/src';
import { renderEntry } from '../../packages/agent/src/services/changelog';
import { handleCommand, UNAUTHORIZED_REPLY, type CommandContext } from '../../packages/agent/src/services/commands';
import { Publisher } from '../../packages/agent/src/services/publisher';
import type { VersionControl } from '../../packages/agent/src/services/versionControl';
import { VersionStore } from '../../packages/agent/src/services/versionStore';

const OP1: ProgramMetadata = {
  project: 'HYDRAULIC MANIFOLD',
  part: '1001',
  postedTimestamp: '2025-10-30-1445',
  operations: 3,
  toolCount: 5,
  machine: 'PUMA',
  setup: 'OP1-ROUGH-FACE'
};

const OP2: ProgramMetadata = { ...OP1, postedTimestamp: '2025-10-31-0910', toolCount: 7, setup: 'OP2-FINISH' };

const noCommits: VersionControl = {
  initRepository: async () => undefined,
  stageAndCommit: async () => true
};

describe('handleCommand', () => {
  let tempDir: string;
  let ctx: CommandContext;

  beforeEach(async () => {
    tempDir = mkdtempSync(join(tmpdir(), 'chip-warden-commands-'));
    const store = await VersionStore.open({ archiveRoot: join(tempDir, 'archive'), versionControl: noCommits });
    const publisher = new Publisher(join(tempDir, 'share'));
    for (const [index, metadata] of [OP1, OP2].entries()) {
      const source = join(tempDir, `post-${index}.nc`);
      writeFileSync(source, `G28 U0 W0 (${index})\n`);
      const archived = await store.archive(source, metadata);
      await publisher.publish(archived.path, metadata, archived.version);
    }
    ctx = { store, publisher, authorizedChatId: '42', startedAt: new Date('2025-11-01T08:00:00.000Z') };
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('answers help for any chat', async () => {
    const reply = await handleCommand(ctx, '99', '/help');
    expect(reply?.split('\n')[0]).toBe('Chip Warden is online.');
    expect(await handleCommand(ctx, '99', '/start')).toBe(reply);
  });

  it('refuses state commands from other chats', async () => {
    expect(await handleCommand(ctx, '99', '/status')).toBe(UNAUTHORIZED_REPLY);
    expect(await handleCommand(ctx, '99', '/cleanup')).toBe(UNAUTHORIZED_REPLY);
    expect(await handleCommand(ctx, '99', '/latest 1001')).toBe(UNAUTHORIZED_REPLY);
  });

  it('ignores unknown commands', async () => {
    expect(await handleCommand(ctx, '42', '/reboot')).toBeNull();
  });

  it('reports status', async () => {
    expect(await handleCommand(ctx, '42', '/status@ChipWardenBot')).toBe(
      [
        'Chip Warden Status',
        '',
        'Running since: 2025-11-01T08:00:00.000Z',
        'Files on share: 2',
        'Archived projects: 1'
      ].join('\n')
    );
  });

  it('keeps one copy per part on cleanup', async () => {
    expect(await handleCommand(ctx, '42', '/cleanup')).toBe('Removed 1 old file(s) from the share');
    expect(await ctx.publisher.listPublished()).toHaveLength(1);
  });

  it('shows the latest version of a part', async () => {
    expect(await handleCommand(ctx, '42', '/latest 1001')).toBe(
      `hydraulic_manifold: v2 (1001_v2_2025-10-31-0910.nc)\n${renderEntry(OP2, 2).trimEnd()}`
    );
  });

  it('explains usage and unknown parts', async () => {
    expect(await handleCommand(ctx, '42', '/latest')).toBe('Usage: /latest <part>');
    expect(await handleCommand(ctx, '42', '/latest 9999')).toBe('No archived versions found for part 9999');
  });
});
