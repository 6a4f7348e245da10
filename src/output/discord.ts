/**
 * Discord Operator Bot
 *
 * Slash commands for the operator, each routed through the scheduler so they
 * never interleave with a running tick:
 * - /status: mode, quota, seen whales and recent topics
 * - /scan: run one tick now
 * - /rescan: forget seen whales and today's quota, then start a new burst
 */

import {
  Client,
  Events,
  GatewayIntentBits,
  REST,
  Routes,
  SlashCommandBuilder,
  type ChatInputCommandInteraction,
} from 'discord.js';
import { describeError } from '../core/index.js';
import { createLogger, truncateText } from '../utils/index.js';

const logger = createLogger('bot');

// =============================================================================
// COMMANDS
// =============================================================================

export type OperatorCommand = 'status' | 'scan' | 'rescan';

/** Each handler returns the reply text. */
export type CommandHandlers = Record<OperatorCommand, () => Promise<string>>;

export const OPERATOR_COMMANDS = [
  new SlashCommandBuilder()
    .setName('status')
    .setDescription('Scheduler mode, AI quota and whale registry'),
  new SlashCommandBuilder()
    .setName('scan')
    .setDescription('Run one whale scan and analysis pass now'),
  new SlashCommandBuilder()
    .setName('rescan')
    .setDescription('Forget seen whales and reset today\'s AI quota'),
].map(command => command.toJSON());

function isOperatorCommand(name: string): name is OperatorCommand {
  return name === 'status' || name === 'scan' || name === 'rescan';
}

/**
 * Resolve a command name to its reply. Errors become a reply, never a throw.
 */
export async function handleCommand(name: string, handlers: CommandHandlers): Promise<string> {
  if (!isOperatorCommand(name)) {
    return 'Unknown command';
  }

  try {
    return truncateText(await handlers[name](), 2000);
  } catch (error) {
    logger.error(`Command /${name} failed: ${describeError(error)}`);
    return `Error: ${truncateText(describeError(error), 200)}`;
  }
}

/**
 * Register slash commands, for one guild when given (instant) or globally.
 */
export async function registerCommands(
  token: string,
  clientId: string,
  guildId?: string
): Promise<void> {
  const rest = new REST().setToken(token);

  try {
    if (guildId) {
      await rest.put(Routes.applicationGuildCommands(clientId, guildId), { body: OPERATOR_COMMANDS });
    } else {
      await rest.put(Routes.applicationCommands(clientId), { body: OPERATOR_COMMANDS });
    }
    logger.info('Registered slash commands');
  } catch (error) {
    logger.error(`Failed to register commands: ${describeError(error)}`);
  }
}

// =============================================================================
// DISCORD BOT
// =============================================================================

async function respond(interaction: ChatInputCommandInteraction, handlers: CommandHandlers): Promise<void> {
  try {
    await interaction.deferReply();
    await interaction.followUp(await handleCommand(interaction.commandName, handlers));
  } catch (error) {
    logger.error(`Could not reply to /${interaction.commandName}: ${describeError(error)}`);
  }
}

/**
 * Start the operator bot. Resolves once logged in; returns the client for shutdown.
 */
export async function startBot(token: string, handlers: CommandHandlers): Promise<Client> {
  const bot = new Client({ intents: [GatewayIntentBits.Guilds] });

  bot.once(Events.ClientReady, ready => {
    logger.info(`Discord bot logged in as ${ready.user.tag}`);
  });

  bot.on(Events.InteractionCreate, async interaction => {
    if (!interaction.isChatInputCommand()) return;
    await respond(interaction, handlers);
  });

  await bot.login(token);
  return bot;
}
