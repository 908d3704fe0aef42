import { type Command } from './types';

export function formatPong(latency: number | null): string {
  if (latency === null) return 'Pong, latency not measured yet.';
  return `Pong, ${latency.toFixed(1)}ms.`;
}

export const pingCommand: Command = {
  name: 'ping',
  aliases: ['p'],
  description: 'Pings the bot and returns latency',
  async run(ctx) {
    await ctx.reply(formatPong(ctx.latency));
  },
};
