import type { Settings } from '../../../shared/src';
import { logger } from '../logger';
import { handleCommand } from './commands';
import { NotificationQueue } from './notifications';
import { ProgramPipeline } from './pipeline';
import { Publisher } from './publisher';
import { CommandPoller, loadTelegramToken, TelegramClient } from './telegram';
import { IsomorphicGitVersionControl, type VersionControl } from './versionControl';
import { VersionStore } from './versionStore';
import { ProgramWatcher } from './watcher';

export type AgentOptions = {
  settings: Settings;
  configDir: string;
  processExisting?: boolean;
  /** Injected in tests; defaults to isomorphic-git. */
  versionControl?: VersionControl;
  /** Injected in tests; defaults to the Telegram client when configured. */
  telegram?: TelegramClient | null;
};

export type RunningAgent = {
  store: VersionStore;
  publisher: Publisher;
  pipeline: ProgramPipeline;
  watcher: ProgramWatcher;
  notifications: NotificationQueue | null;
  stop(): Promise<void>;
};

function resolveTelegram(settings: Settings, configDir: string): TelegramClient | null {
  const cfg = settings.notifications;
  if (!cfg.enabled) return null;
  const token = loadTelegramToken(configDir);
  if (!token || !cfg.chatId) {
    logger.warn('agent: notifications enabled but bot token or chat id missing; notifications disabled');
    return null;
  }
  logger.info('agent: telegram notifications enabled');
  return new TelegramClient(token, cfg.chatId);
}

export async function createStore(settings: Settings, versionControl?: VersionControl): Promise<VersionStore> {
  return VersionStore.open({
    archiveRoot: settings.paths.archiveRoot,
    versionControl:
      versionControl ??
      new IsomorphicGitVersionControl({ name: settings.archive.authorName, email: settings.archive.authorEmail }),
    commitOnArchive: settings.archive.commitOnArchive
  });
}

export async function startAgent(options: AgentOptions): Promise<RunningAgent> {
  const { settings } = options;
  logger.info(
    {
      watchDir: settings.paths.watchDir,
      archiveRoot: settings.paths.archiveRoot,
      publishDir: settings.paths.publishDir
    },
    'agent: starting'
  );

  const store = await createStore(settings, options.versionControl);
  const publisher = new Publisher(settings.paths.publishDir);
  const telegram = options.telegram === undefined ? resolveTelegram(settings, options.configDir) : options.telegram;
  const notifications = telegram
    ? new NotificationQueue(telegram, { limit: settings.notifications.queueLimit })
    : null;

  const pipeline = new ProgramPipeline({
    store,
    publisher,
    notifier: notifications,
    keepCount: settings.publish.keepCount,
    notifyOnPost: settings.notifications.notifyOnPost
  });

  const watcher = new ProgramWatcher(settings.paths.watchDir, (path) => pipeline.process(path), {
    settleDelayMs: settings.watcher.settleDelayMs,
    extensions: settings.watcher.extensions
  });
  await watcher.start();
  if (options.processExisting ?? settings.watcher.processExisting) {
    await watcher.enqueueExisting();
  }

  const startedAt = new Date();
  const poller =
    telegram && settings.notifications.commands
      ? new CommandPoller(telegram, (chatId, text) =>
          handleCommand({ store, publisher, authorizedChatId: settings.notifications.chatId, startedAt }, chatId, text)
        )
      : null;
  poller?.start();

  notifications?.notify('agent.online', { watchDir: settings.paths.watchDir });
  logger.info('agent: running; watching for new programs');

  let stopping: Promise<void> | null = null;
  const stop = () => {
    if (stopping) return stopping;
    stopping = (async () => {
      logger.info('agent: stopping');
      await watcher.stop();
      await poller?.stop();
      notifications?.notify('agent.offline', { watchDir: settings.paths.watchDir });
      await notifications?.close();
      logger.info('agent: stopped');
    })();
    return stopping;
  };

  return { store, publisher, pipeline, watcher, notifications, stop };
}
