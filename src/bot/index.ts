/* ===============================
   IMPORTS & ENV
   =============================== */

import * as fs from 'node:fs';
import { Bot, InputFile, Keyboard } from 'grammy';

import { ConfigError, loadConfig, type AppConfig } from '../config/env.js';
import { createJournal } from '../core/journal.js';
import { createLogger } from '../core/logging.js';
import { OrderExecutor } from '../core/orderExecutor.js';
import { PositionManager } from '../core/positionManager.js';
import { QuoteCache } from '../market/quoteCache.js';
import { BybitMarketFeed, BybitOrderGateway, createBybitClients } from '../services/bybit.js';
import { TelegramNotifier } from '../services/telegram.js';
import { closeCommand, statusCommand, tradeCommand } from './commands.js';
import { HELP_TEXT } from './messages.js';

function readConfig(): AppConfig {
  try {
    return loadConfig();
  } catch (e) {
    if (e instanceof ConfigError) {
      console.error('Missing env vars:', e.keys.join(', '));
      process.exit(1);
    }
    throw e;
  }
}

const config = readConfig();
const log = createLogger('bot', { level: config.logLevel });
const scoped = (scope: string) => createLogger(scope, { level: config.logLevel });

/* ===============================
   TRADING CORE
   =============================== */

const { rest, ws } = createBybitClients(config.bybit);
const bot = new Bot(config.telegram.botToken);

const quotes = new QuoteCache(scoped('quotes'));
const feed = new BybitMarketFeed(ws, quotes, config.trading.symbol, scoped('feed'));
const gateway = new BybitOrderGateway(rest, scoped('gateway'));
const executor = new OrderExecutor(gateway, scoped('orders'));
const notifier = new TelegramNotifier(bot.api, config.telegram.chatId, scoped('telegram'));

const manager = new PositionManager(
  {
    symbol: config.trading.symbol,
    quantity: config.trading.quantity,
    targetProfitPercent: config.trading.targetProfitPercent,
  },
  {
    quotes,
    executor,
    notifier,
    log: scoped('position'),
    journal: createJournal(config.journalPath, scoped('journal')),
  }
);

/* ===============================
   GLOBAL GUARDS & SHUTDOWN
   =============================== */

let isShuttingDown = false;

async function shutdown(signal: string) {
  if (isShuttingDown) return;
  isShuttingDown = true;

  log.info(`🛑 Shutdown (${signal})`);

  const state = manager.currentState;
  if (state !== 'idle') {
    log.warn(`Shutting down with position in state "${state}", it stays open on the exchange`);
  }

  await manager.stop();
  feed.stop();
  await gateway.drain();
  executor.dispose();

  try {
    await bot.stop();
  } catch (err) {
    log.error('Bot shutdown error:', err);
  }

  process.exit(0);
}

process.on('SIGINT', () => {
  shutdown('SIGINT').catch(err => log.error('Shutdown failed:', err));
});
process.on('SIGTERM', () => {
  shutdown('SIGTERM').catch(err => log.error('Shutdown failed:', err));
});

process.on('uncaughtException', err => {
  log.error('UNCAUGHT EXCEPTION:', err);
});

process.on('unhandledRejection', reason => {
  log.error('UNHANDLED REJECTION:', reason);
});

/* ===============================
   KEYBOARD
   =============================== */

const mainKeyboard = new Keyboard()
  .text('/trade')
  .text('/status')
  .row()
  .text('/close')
  .text('/download_logs')
  .resized();

/* ===============================
   COMMANDS
   =============================== */

// Only the configured trading chat may drive the bot
bot.use(async (ctx, next) => {
  if (String(ctx.chat?.id) !== config.telegram.chatId) {
    log.warn(`Ignoring update from chat ${ctx.chat?.id}`);
    return;
  }
  await next();
});

bot.command('start', async ctx => {
  await ctx.reply(HELP_TEXT, { reply_markup: mainKeyboard });
});

bot.command('trade', async ctx => {
  try {
    await tradeCommand(manager, text => ctx.reply(text));
  } catch (e) {
    log.error('Error in /trade:', e);
    await ctx.reply('❌ An error occurred while opening a position');
  }
});

bot.command('status', async ctx => {
  try {
    await statusCommand(manager, text => ctx.reply(text));
  } catch (e) {
    log.error('Error in /status:', e);
    await ctx.reply('❌ An error occurred while checking the position status');
  }
});

bot.command('close', async ctx => {
  try {
    await closeCommand(manager, text => ctx.reply(text));
  } catch (e) {
    log.error('Error in /close:', e);
    await ctx.reply('❌ An error occurred while closing the position');
  }
});

bot.command('download_logs', async ctx => {
  if (!fs.existsSync(config.journalPath)) {
    await ctx.reply('📭 No trades recorded yet');
    return;
  }
  try {
    await ctx.replyWithDocument(
      new InputFile(fs.createReadStream(config.journalPath), 'trades.log')
    );
  } catch (error) {
    log.error('Error sending log file:', error);
    await ctx.reply('❌ Error sending log file');
  }
});

/* ===============================
   FALLBACK & START
   =============================== */

bot.on('message:text', async ctx => {
  await ctx.reply(HELP_TEXT, { reply_markup: mainKeyboard });
});

bot.catch(err => log.error('Bot error:', err));

async function main() {
  await feed.start();

  log.info('🚀 Starting bot...');
  await bot.start({
    onStart: info => {
      log.info(`🤖 Bot @${info.username} is running! Trading ${config.trading.symbol}`);
    },
  });
}

main().catch(err => {
  log.error('Startup failed:', err);
  process.exit(1);
});
