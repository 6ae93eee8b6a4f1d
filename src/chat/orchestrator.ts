import { InvalidInputError } from '../errors';
import type { LanguageModel } from '../llm/languageModelClient';
import { createLogger, describeError } from '../logger';
import { buildPrompt } from '../prompt/promptBuilder';
import type { SessionStore } from '../session/sessionStore';
import type { SportsResult } from '../sports/sportsClient';
import type { ChatMessage, ChatReply, SessionContext, SportsIntent } from '../types';

const logger = createLogger('chat');

export const ERROR_REPLY =
  '¡Vaya! Estoy teniendo dificultades técnicas momentáneas. ' +
  'Mientras tanto puedo orientarte sobre estrategias de apuestas, equipos y torneos. ¿Sobre qué deporte quieres conversar?';

export type ConversationStage =
  | 'Received'
  | 'ContextLoaded'
  | 'SportsQueried'
  | 'SportsSkipped'
  | 'PromptBuilt'
  | 'ModelInvoked'
  | 'ContextUpdated'
  | 'Replied';

export interface SportsLookup {
  query(text: string): Promise<SportsResult>;
}

export interface OrchestratorDeps {
  sessions: SessionStore;
  sports: SportsLookup;
  model: LanguageModel;
  /** Turns of history put into each prompt. Defaults to the store's cap. */
  historyWindow?: number;
  onStage?: (stage: ConversationStage, sessionId: string) => void;
}

function contextPatch(intent: SportsIntent): SessionContext {
  const patch: SessionContext = {};
  if (intent.teams.length > 0) patch.lastTeams = [...intent.teams];
  if (intent.tournaments.length > 0) patch.lastTournament = intent.tournaments[0];
  if (intent.betTypes.length > 0) patch.preferredBetTypes = [...intent.betTypes];
  return patch;
}

export function validateMessage(input: ChatMessage): void {
  if (!input.message.trim()) throw new InvalidInputError('message must not be empty');
  if (!input.sessionId.trim()) throw new InvalidInputError('session_id must not be empty');
}

/**
 * Handles one chat message end to end. Dependency failures degrade into
 * fallback text; only invalid input is thrown back to the caller.
 */
export class ConversationOrchestrator {
  constructor(private readonly deps: OrchestratorDeps) {}

  async handle(input: ChatMessage): Promise<ChatReply> {
    validateMessage(input);
    const sessionId = input.sessionId;
    const text = input.message.trim();

    try {
      return await this.deps.sessions.withSession(sessionId, () => this.run(sessionId, text));
    } catch (error) {
      logger.error(`session ${sessionId}: unexpected failure: ${describeError(error)}`, error);
      return { response: ERROR_REPLY, sessionId };
    }
  }

  private stage(stage: ConversationStage, sessionId: string): void {
    logger.debug(`session ${sessionId}: ${stage}`);
    this.deps.onStage?.(stage, sessionId);
  }

  private async run(sessionId: string, text: string): Promise<ChatReply> {
    const { sessions, sports, model } = this.deps;
    this.stage('Received', sessionId);

    const session = sessions.getOrCreate(sessionId);
    this.stage('ContextLoaded', sessionId);

    const lookup = await sports.query(text);
    this.stage(lookup.kind === 'data' ? 'SportsQueried' : 'SportsSkipped', sessionId);
    if (lookup.kind === 'failed') {
      logger.warn(`session ${sessionId}: continuing without sports data: ${lookup.error.message}`);
    }

    const intent = 'intent' in lookup ? lookup.intent : null;
    const prompt = buildPrompt({
      userText: text,
      history: session.turns,
      sportsData: lookup.kind === 'data' ? lookup.data : null,
      context: session.context,
      intent,
      historyWindow: this.deps.historyWindow ?? sessions.maxTurns,
    });
    this.stage('PromptBuilt', sessionId);

    const reply = await model.generateReply(prompt);
    this.stage('ModelInvoked', sessionId);

    sessions.appendTurn(sessionId, text, reply);
    if (intent) sessions.updateContext(sessionId, contextPatch(intent));
    this.stage('ContextUpdated', sessionId);

    this.stage('Replied', sessionId);
    return { response: reply, sessionId };
  }
}
