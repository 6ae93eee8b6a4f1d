import { z } from 'zod';
import type { LanguageModel } from '../llm/languageModelClient';
import { createLogger, describeError } from '../logger';
import type { QuestionType, SportsIntent } from '../types';
import { extractDates, formatDay } from './dates';
import { type EntityKind, KeywordIntentDetector, type SportsIntentDetector } from './intent';

const logger = createLogger('intent');

export const EXTRACTION_INSTRUCTION = [
  'Eres un analista de deportes y apuestas. Identifica los componentes de la consulta del usuario.',
  '- teams: equipos o jugadores mencionados.',
  '- tournaments: ligas, copas o torneos.',
  '- dates: fechas en formato YYYY-MM-DD.',
  '- bet_types: tipos de apuesta (moneyline, spread, over/under, parlay, prop bet...).',
  '- question_type: "Análisis y Recomendación", "Estadísticas" o "Información General".',
  'Si un elemento no aparece, deja su lista vacía.',
  'Devuelve SOLO un objeto JSON con esta estructura, sin texto adicional:',
  '{"teams": [], "tournaments": [], "dates": [], "bet_types": [], "question_type": ""}',
].join('\n');

const EntitiesSchema = z.object({
  teams: z.array(z.string()).default([]),
  tournaments: z.array(z.string()).default([]),
  dates: z.array(z.string()).default([]),
  bet_types: z.array(z.string()).default([]),
  question_type: z.string().default(''),
});

export type ExtractedEntities = z.infer<typeof EntitiesSchema>;

const CODE_FENCE = /^```(?:json)?\s*([\s\S]*?)\s*```$/i;

export function stripCodeFence(reply: string): string {
  const trimmed = reply.trim();
  return CODE_FENCE.exec(trimmed)?.[1] ?? trimmed;
}

/** Parse the model's JSON answer; null when it is not the expected object. */
export function parseEntities(reply: string): ExtractedEntities | null {
  let raw: unknown;
  try {
    raw = JSON.parse(stripCodeFence(reply));
  } catch (error) {
    logger.debug(`entity reply is not JSON: ${describeError(error)}`);
    return null;
  }
  const parsed = EntitiesSchema.safeParse(raw);
  if (!parsed.success) {
    logger.debug(`entity reply has the wrong shape: ${parsed.error.issues.map((issue) => issue.message).join(', ')}`);
    return null;
  }
  return parsed.data;
}

export function toQuestionType(label: string): QuestionType {
  const value = label.trim().toLowerCase();
  if (value.startsWith('análisis') || value.startsWith('analisis') || value === 'analysis') return 'analysis';
  if (value.startsWith('estad') || value === 'statistics') return 'statistics';
  return 'general';
}

function isIsoDay(value: string): boolean {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
  if (!match) return false;
  const day = new Date(Number(match[1]), Number(match[2]) - 1, Number(match[3]));
  return formatDay(day) === value;
}

function unique(values: string[]): string[] {
  return [...new Set(values)];
}

/**
 * Asks the language model for the entities in a message and maps them onto
 * the keyword vocabulary. Falls back to the keyword detector whenever the
 * model is unavailable or its answer cannot be parsed.
 */
export class ModelIntentDetector implements SportsIntentDetector {
  constructor(
    private readonly model: LanguageModel,
    private readonly fallback: KeywordIntentDetector = new KeywordIntentDetector(),
    private readonly now: () => Date = () => new Date(),
  ) {}

  async detect(text: string): Promise<SportsIntent | null> {
    const keyword = this.fallback.match(text);

    const result = await this.model.generate(`${EXTRACTION_INSTRUCTION}\n\nConsulta del usuario: ${text}`);
    if (!result.ok) {
      logger.warn(`entity extraction unavailable (${result.reason}), using keywords`);
      return keyword;
    }
    const entities = parseEntities(result.text);
    if (!entities) {
      logger.warn('entity extraction returned no usable JSON, using keywords');
      return keyword;
    }

    const intent: SportsIntent = {
      teams: this.names('teams', entities.teams),
      tournaments: this.names('tournaments', entities.tournaments),
      betTypes: this.names('betTypes', entities.bet_types),
      dates: unique([...extractDates(text, this.now()), ...entities.dates.filter(isIsoDay)]),
      questionType: toQuestionType(entities.question_type),
    };

    const namesEntity = intent.teams.length > 0 || intent.tournaments.length > 0 || intent.betTypes.length > 0;
    return namesEntity || keyword ? intent : null;
  }

  private names(kind: EntityKind, names: string[]): string[] {
    return unique(names.filter((name) => name.trim()).map((name) => this.fallback.canonical(kind, name)));
  }
}
