import dotenv from 'dotenv';
import type { Server } from 'node:http';
import type { Telegraf } from 'telegraf';
import { ConversationOrchestrator } from './chat/orchestrator';
import { type AppConfig, loadConfig } from './config';
import { createServer } from './http/server';
import { LanguageModelClient } from './llm/languageModelClient';
import { createLogger, describeError, setLogLevel } from './logger';
import { SessionStore } from './session/sessionStore';
import { KeywordIntentDetector } from './sports/intent';
import { ModelIntentDetector } from './sports/modelIntent';
import { SportsDataClient } from './sports/sportsClient';
import { createTelegramBot } from './telegram/bot';

dotenv.config();

const logger = createLogger('app');
const SWEEP_INTERVAL_MS = 60_000;

export interface App {
  sessions: SessionStore;
  sports: SportsDataClient;
  orchestrator: ConversationOrchestrator;
}

export function buildApp(config: AppConfig): App {
  const sessions = new SessionStore({ maxTurns: config.session.maxTurns, ttlMs: config.session.ttlMs });
  const model = new LanguageModelClient(config.llm);
  const keywords = new KeywordIntentDetector();
  const detector =
    config.intentDetector === 'model' && config.llm.apiKey ? new ModelIntentDetector(model, keywords) : keywords;
  const sports = new SportsDataClient(config.sports, detector);
  const orchestrator = new ConversationOrchestrator({ sessions, sports, model });
  return { sessions, sports, orchestrator };
}

async function start(): Promise<void> {
  try {
    const config = loadConfig();
    setLogLevel(config.logLevel);
    const { sessions, sports, orchestrator } = buildApp(config);

    const sweeper = setInterval(() => {
      const removed = sessions.sweep();
      if (removed > 0) logger.debug(`expired ${removed} session(s)`);
    }, SWEEP_INTERVAL_MS);
    sweeper.unref();

    const app = createServer({
      orchestrator,
      isSportsApiConnected: () => sports.isConnected(),
      sessionCount: () => sessions.size,
    });
    const server: Server = app.listen(config.port, () => {
      logger.info(`🚀 HTTP server on port ${config.port}`);
    });

    let bot: Telegraf | undefined;
    let botRunning = false;
    if (config.telegram) {
      bot = createTelegramBot(config.telegram, { orchestrator, sessions });
      bot
        .launch(() => {
          botRunning = true;
          logger.info('🤖 Telegram bot running');
        })
        .catch((error: unknown) => {
          botRunning = false;
          logger.error(`Telegram bot stopped: ${describeError(error)}`, error);
        });
    } else {
      logger.info('BOT_TOKEN not set, Telegram channel disabled');
    }

    const shutdown = (signal: string) => {
      logger.info(`${signal} received, shutting down`);
      clearInterval(sweeper);
      if (botRunning) bot?.stop(signal);
      server.close(() => process.exit(0));
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));
  } catch (error) {
    logger.error(`❌ Failed to start: ${describeError(error)}`);
    process.exit(1);
  }
}

if (require.main === module) {
  void start();
}
