import { pingCommand } from './ping';
import { type Command } from './types';

export const defaultCommands: readonly Command[] = [pingCommand];

export { pingCommand, formatPong } from './ping';
export type { Command, CommandContext } from './types';
