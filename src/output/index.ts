/**
 * Output module exports
 */

export {
  ChannelTransport,
  DiscordWebhookDestination,
  TelegramDestination,
  createTransport,
  toPlainText,
  type Destination,
} from './channels.js';

export {
  formatWhaleAlert,
  formatInsight,
  formatStatus,
  marketUrl,
} from './format.js';

// Operator bot
export {
  startBot,
  registerCommands,
  handleCommand,
  OPERATOR_COMMANDS,
  type CommandHandlers,
  type OperatorCommand,
} from './discord.js';
