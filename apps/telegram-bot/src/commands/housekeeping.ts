/**
 * /last, /clear, /help
 */

import type { CommandDefinition } from '../dispatcher.js';
import { formatHistory } from '../format.js';
import { escapeHtml } from '../text.js';

export const last: CommandDefinition = {
  name: 'last',
  usage: '/last',
  description: 'List recent downloads',
  async handler(ctx) {
    const { history } = ctx.services;
    if (!history.enabled) {
      return 'Recent downloads are turned off.';
    }
    return formatHistory(await history.recent());
  },
};

export const clear: CommandDefinition = {
  name: 'clear',
  usage: '/clear',
  description: 'Delete the messages this bot sent here',
  async handler(ctx) {
    const summary = ctx.autoCleared ?? (await ctx.services.registry.clear(ctx.operation.conversation));
    const lines = [`🧹 Deleted ${summary.deleted} of ${summary.requested} messages.`];
    if (summary.skipped > 0) {
      lines.push(`${summary.skipped} could not be deleted (too old or already gone).`);
    }
    return lines.join('\n');
  },
};

export function helpCommand(commands: () => readonly CommandDefinition[]): CommandDefinition {
  return {
    name: 'help',
    aliases: ['start'],
    usage: '/help',
    description: 'Show this list',
    async handler(ctx) {
      const lines = ['<b>Commands</b>', ''];
      for (const command of commands()) {
        lines.push(`<code>${escapeHtml(command.usage)}</code>`);
        lines.push(`    ${escapeHtml(command.description)}`);
      }
      lines.push('', `Catalog session: <i>${ctx.services.catalog.state}</i>`);
      return lines.join('\n');
    },
  };
}
