/**
 * Telegram Bot Commands
 */

import type { CommandDefinition } from '../dispatcher.js';
import { alast, likes, rec } from './account.js';
import { dl } from './download.js';
import { clear, helpCommand, last } from './housekeeping.js';
import { lyrics, search, see } from './lookup.js';

export function buildCommands(): CommandDefinition[] {
  const commands: CommandDefinition[] = [search, see, dl, lyrics, last, rec, alast, likes, clear];
  commands.push(helpCommand(() => commands));
  return commands;
}
