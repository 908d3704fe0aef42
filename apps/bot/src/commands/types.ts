import { type Message } from '@relaycord/domain';

export interface CommandContext {
  message: Message;
  args: string[];
  /** Gateway heartbeat round-trip in milliseconds, null before the first ack. */
  latency: number | null;
  reply(content: string): Promise<Message>;
}

export interface Command {
  name: string;
  aliases: string[];
  description: string;
  run(ctx: CommandContext): Promise<void>;
}
