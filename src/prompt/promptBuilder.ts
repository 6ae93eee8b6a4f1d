import type { JsonValue, QuestionType, SessionContext, SportsData, SportsIntent, Turn } from '../types';

export const SYSTEM_INSTRUCTION = [
  'Eres un asistente experto en deportes y apuestas deportivas.',
  'Responde en español, de forma directa y amable, empezando por la información más relevante.',
  'Si hay datos deportivos disponibles, úsalos para responder y preséntalos en listas con viñetas (•).',
  'Si no hay datos, dilo con honestidad, no inventes partidos ni cuotas, y sugiere una consulta alternativa.',
  'Usa la conversación reciente para mantener la continuidad.',
  'Termina con un breve recordatorio de juego responsable.',
].join('\n');

export const HEADINGS = {
  context: '### Contexto previo',
  history: '### Conversación reciente',
  intent: '### Entidades identificadas',
  sports: '### Datos deportivos disponibles',
  query: '### Consulta del usuario',
} as const;

export const QUESTION_LABELS: Record<QuestionType, string> = {
  analysis: 'análisis y recomendación',
  statistics: 'estadísticas',
  general: 'información general',
};

/** How the answer should be angled for each kind of question. */
export const QUESTION_GUIDANCE: Record<QuestionType, string> = {
  analysis: 'Ofrece una sugerencia de apuesta breve basada en las cuotas y explica la lógica detrás.',
  statistics: 'Céntrate en los datos concretos; si faltan, explica por qué la información es limitada.',
  general: 'Responde de forma informativa con los partidos y cuotas disponibles.',
};

export interface PromptInput {
  userText: string;
  history: readonly Turn[];
  /** Absent or empty when the sports lookup was skipped or found nothing. */
  sportsData?: SportsData | null;
  context?: Readonly<SessionContext>;
  /** What was detected in this message; absent when it is not a sports request. */
  intent?: SportsIntent | null;
  /** How many of the most recent turns to include. Defaults to all given. */
  historyWindow?: number;
}

function renderScalar(value: JsonValue): string {
  if (value === null) return '-';
  if (typeof value === 'string') return value;
  return String(value);
}

/** Inline rendering with object keys sorted, so equal data always reads the same. */
export function renderValue(value: JsonValue): string {
  if (Array.isArray(value)) {
    return `[${value.map(renderValue).join(', ')}]`;
  }
  if (typeof value === 'object' && value !== null) {
    return Object.keys(value)
      .sort()
      .map((key) => `${key}: ${renderValue(value[key])}`)
      .join('; ');
  }
  return renderScalar(value);
}

function hasContent(value: JsonValue): boolean {
  if (value === null) return false;
  if (Array.isArray(value)) return value.length > 0;
  if (typeof value === 'object') return Object.keys(value).length > 0;
  if (typeof value === 'string') return value.trim().length > 0;
  return true;
}

export function renderSportsData(data: SportsData): string {
  const lines: string[] = [];
  for (const key of Object.keys(data).sort()) {
    const value = data[key];
    if (!hasContent(value)) continue;
    if (Array.isArray(value)) {
      lines.push(`${key}:`);
      value.forEach((item, index) => lines.push(`  ${index + 1}. ${renderValue(item)}`));
    } else {
      lines.push(`${key}: ${renderValue(value)}`);
    }
  }
  return lines.join('\n');
}

function renderContext(context: Readonly<SessionContext>): string {
  const lines: string[] = [];
  if (context.lastTeams?.length) lines.push(`- Equipos mencionados: ${context.lastTeams.join(', ')}`);
  if (context.lastTournament) lines.push(`- Torneo: ${context.lastTournament}`);
  if (context.preferredBetTypes?.length) {
    lines.push(`- Tipos de apuesta preferidos: ${context.preferredBetTypes.join(', ')}`);
  }
  return lines.join('\n');
}

export function renderIntent(intent: SportsIntent): string {
  const lines: string[] = [];
  if (intent.teams.length) lines.push(`- Equipos: ${intent.teams.join(', ')}`);
  if (intent.tournaments.length) lines.push(`- Torneos: ${intent.tournaments.join(', ')}`);
  if (intent.betTypes.length) lines.push(`- Tipos de apuesta: ${intent.betTypes.join(', ')}`);
  if (intent.dates.length) lines.push(`- Fechas: ${intent.dates.join(', ')}`);
  lines.push(`- Tipo de consulta: ${QUESTION_LABELS[intent.questionType]}`);
  lines.push(`Enfoque: ${QUESTION_GUIDANCE[intent.questionType]}`);
  return lines.join('\n');
}

function renderHistory(turns: readonly Turn[]): string {
  return turns.map((turn) => `Usuario: ${turn.user}\nAsistente: ${turn.assistant}`).join('\n\n');
}

/**
 * Assemble the text sent to the language model. Pure: the same input always
 * yields the same prompt. Sections with nothing to say are left out entirely.
 */
export function buildPrompt(input: PromptInput): string {
  const sections = [SYSTEM_INSTRUCTION];

  const context = input.context ? renderContext(input.context) : '';
  if (context) sections.push(`${HEADINGS.context}\n${context}`);

  const window = input.historyWindow ?? input.history.length;
  const recent = window > 0 ? input.history.slice(-window) : [];
  if (recent.length > 0) sections.push(`${HEADINGS.history}\n${renderHistory(recent)}`);

  if (input.intent) sections.push(`${HEADINGS.intent}\n${renderIntent(input.intent)}`);

  const sports = input.sportsData ? renderSportsData(input.sportsData) : '';
  if (sports) sections.push(`${HEADINGS.sports}\n${sports}`);

  sections.push(`${HEADINGS.query}\n${input.userText.trim()}`);
  return sections.join('\n\n');
}
