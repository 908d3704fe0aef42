import {
  type EntityStore,
  type Message,
  type MessageService,
  messageFromPayload,
} from '@relaycord/domain';
import { MESSAGE_CREATE, MessagePayloadSchema, READY } from '@relaycord/proto';
import { type BotConfig, createLogger, errMessage } from '@relaycord/shared';
import { type ClientOverrides, type RelayClient, createClient } from './client';
import { type Command, defaultCommands } from './commands';

const logger = createLogger({ name: 'bot' });

export interface CommandRouterDeps {
  prefix: string;
  commands: readonly Command[];
  messages: MessageService;
  selfUserId: () => string | null;
  latency: () => number | null;
}

/**
 * Prefix command dispatch for a self-bot: only messages the local user wrote
 * are considered.
 */
export class CommandRouter {
  private readonly byName = new Map<string, Command>();

  constructor(private readonly deps: CommandRouterDeps) {
    for (const command of deps.commands) {
      for (const name of [command.name, ...command.aliases]) {
        const key = name.toLowerCase();
        if (this.byName.has(key)) {
          throw new Error(`Duplicate command name: ${key}`);
        }
        this.byName.set(key, command);
      }
    }
  }

  resolve(name: string): Command | null {
    return this.byName.get(name.toLowerCase()) ?? null;
  }

  /** Returns true when a command ran to completion. */
  async handle(message: Message): Promise<boolean> {
    const { prefix, messages } = this.deps;
    if (message.authorId !== this.deps.selfUserId()) return false;
    if (!message.content.startsWith(prefix)) return false;

    const [name, ...args] = message.content.slice(prefix.length).trim().split(/\s+/);
    if (!name) return false;
    const command = this.resolve(name);
    if (!command) return false;

    try {
      await command.run({
        message,
        args,
        latency: this.deps.latency(),
        reply: (content) => messages.reply(message, content, false),
      });
      return true;
    } catch (err) {
      logger.error(
        { command: command.name, channelId: message.channelId, err: errMessage(err) },
        'Command failed',
      );
      return false;
    }
  }
}

/** One line per cached guild, as logged when the session becomes ready. */
export function guildSummary(store: EntityStore): string[] {
  return store
    .all('guild')
    .map((guild) => `${guild.name} (${guild.id}) - ${guild.memberCount ?? 'unknown'} Members`);
}

export interface Bot {
  client: RelayClient;
  router: CommandRouter;
}

/** Composes the client and hooks the command router and ready summary onto its dispatcher. */
export function createBot(
  config: BotConfig,
  overrides: ClientOverrides = {},
  commands: readonly Command[] = defaultCommands,
): Bot {
  const client = createClient(config, overrides);
  const { store, session, dispatcher, messages } = client;

  const router = new CommandRouter({
    prefix: config.COMMAND_PREFIX,
    commands,
    messages,
    selfUserId: () => store.selfUserId,
    latency: () => session.latency,
  });

  dispatcher.on(READY, () => {
    const self = store.selfUserId ? store.get('user', store.selfUserId) : null;
    const guilds = guildSummary(store);
    logger.info(
      { userId: self?.id, username: self?.username, guildCount: guilds.length, guilds },
      'Connected to the gateway',
    );
  });

  dispatcher.on(MESSAGE_CREATE, (payload) => {
    const parsed = MessagePayloadSchema.safeParse(payload);
    if (!parsed.success) return;
    router.handle(messageFromPayload(parsed.data)).catch((err) => {
      logger.error({ err: errMessage(err) }, 'Command routing failed');
    });
  });

  return { client, router };
}
