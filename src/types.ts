// src/types.ts
export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

/** Whatever the sports API returned, trimmed; rendered into the prompt as-is. */
export type SportsData = JsonObject;

export interface Turn {
  user: string;
  assistant: string;
  at: number;
}

/** Entities carried over between turns so follow-ups like "¿y mañana?" keep their subject. */
export interface SessionContext {
  lastTeams?: string[];
  lastTournament?: string;
  preferredBetTypes?: string[];
}

export interface Session {
  id: string;
  turns: readonly Turn[];
  context: Readonly<SessionContext>;
  createdAt: number;
  lastActiveAt: number;
}

export interface ChatMessage {
  message: string;
  sessionId: string;
}

export interface ChatReply {
  response: string;
  sessionId: string;
}

export type QuestionType = 'analysis' | 'statistics' | 'general';

export interface SportsIntent {
  teams: string[];
  tournaments: string[];
  betTypes: string[];
  /** YYYY-MM-DD, in the order they were found. */
  dates: string[];
  questionType: QuestionType;
}
