import axios, { type AxiosInstance } from 'axios';
import type { SportsApiConfig } from '../config';
import { UpstreamUnavailableError } from '../errors';
import { createLogger, describeError } from '../logger';
import type { JsonObject, JsonValue, SportsData, SportsIntent } from '../types';
import type { SportsIntentDetector } from './intent';

const logger = createLogger('sports');

export type SportsResult =
  | { kind: 'data'; data: SportsData; intent: SportsIntent }
  | { kind: 'empty'; reason: 'no_intent' }
  | { kind: 'empty'; reason: 'no_results'; intent: SportsIntent }
  | { kind: 'failed'; error: UpstreamUnavailableError; intent: SportsIntent };

interface OddsFilter {
  tournament?: string;
  fixtureId?: string | number;
}

/** A request either yields a payload or an error; transport problems never throw. */
type Fetched = { ok: true; payload: JsonValue } | { ok: false; error: UpstreamUnavailableError };

const LIST_FIELDS = ['data', 'results', 'fixtures', 'odds'];
const HOME_FIELDS = ['home_team', 'homeTeam', 'home', 'team_home', 'team1'];
const AWAY_FIELDS = ['away_team', 'awayTeam', 'away', 'team_away', 'team2'];
const ID_FIELDS = ['id', 'fixture_id', '_id'];

function isObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Upstream answers with a bare list, a wrapped list, or `{ totalResults: 0 }`. */
export function toList(payload: JsonValue): JsonValue[] {
  if (Array.isArray(payload)) return payload;
  if (!isObject(payload)) return [];
  if (payload.totalResults === 0) return [];
  for (const field of LIST_FIELDS) {
    const candidate = payload[field];
    if (Array.isArray(candidate)) return candidate;
  }
  return [payload];
}

function firstString(item: JsonObject, fields: string[]): string {
  for (const field of fields) {
    const value = item[field];
    if (typeof value === 'string' && value) return value;
  }
  return '';
}

function fixtureId(item: JsonValue | undefined): string | number | undefined {
  if (!isObject(item)) return undefined;
  for (const field of ID_FIELDS) {
    const value = item[field];
    if (typeof value === 'string' || typeof value === 'number') return value;
  }
  return undefined;
}

/** Keep fixtures where either side contains one of the requested team names. */
export function filterFixturesByTeams(fixtures: JsonValue[], teams: string[]): JsonValue[] {
  if (teams.length === 0) return fixtures;
  const wanted = teams.map((team) => team.toLowerCase());
  return fixtures.filter((fixture) => {
    if (!isObject(fixture)) return false;
    const home = firstString(fixture, HOME_FIELDS).toLowerCase();
    const away = firstString(fixture, AWAY_FIELDS).toLowerCase();
    return wanted.some((team) => home.includes(team) || away.includes(team));
  });
}

function compactParams(params: Record<string, string | number | undefined>): Record<string, string | number> {
  const out: Record<string, string | number> = {};
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined && value !== '') out[key] = value;
  }
  return out;
}

/**
 * Read-only client for the sports/odds API. Every call is best effort: a
 * failing upstream is reported in the result and logged, never thrown.
 */
export class SportsDataClient {
  private readonly http: AxiosInstance;

  constructor(
    private readonly config: SportsApiConfig,
    private readonly detector: SportsIntentDetector,
    http?: AxiosInstance,
  ) {
    this.http =
      http ??
      axios.create({
        baseURL: config.baseUrl,
        timeout: config.timeoutMs,
        headers: config.apiKey ? { 'x-api-key': config.apiKey } : undefined,
      });
  }

  async query(text: string): Promise<SportsResult> {
    const intent = await this.detector.detect(text);
    if (!intent) return { kind: 'empty', reason: 'no_intent' };
    return this.lookup(intent);
  }

  /** Fixtures for the first tournament/date, narrowed to the teams, then their odds. */
  async lookup(intent: SportsIntent): Promise<SportsResult> {
    const tournament = intent.tournaments[0];
    const date = intent.dates[0];
    const limit = this.config.maxItems;

    const fixturesResponse = await this.request('/sports/fixtures', { tournament, date });
    if (!fixturesResponse.ok) {
      return { kind: 'failed', error: fixturesResponse.error, intent };
    }

    const fixtures = toList(fixturesResponse.payload);
    const data: SportsData = {};
    let oddsFilter: OddsFilter = { tournament };

    if (fixtures.length > 0) {
      const matching = filterFixturesByTeams(fixtures, intent.teams).slice(0, limit);
      data.fixtures = matching;
      oddsFilter = { tournament, fixtureId: fixtureId(matching[0]) };
    } else {
      logger.debug('no fixtures found, asking for odds directly');
    }

    const oddsResponse = await this.request('/sports/odds', {
      tournament: oddsFilter.tournament,
      fixture_id: oddsFilter.fixtureId,
    });
    if (oddsResponse.ok) {
      data.odds = toList(oddsResponse.payload).slice(0, limit);
    }

    const hasFixtures = Array.isArray(data.fixtures) && data.fixtures.length > 0;
    const hasOdds = Array.isArray(data.odds) && data.odds.length > 0;
    if (!hasFixtures && !hasOdds) {
      if (!oddsResponse.ok && fixtures.length === 0) {
        return { kind: 'failed', error: oddsResponse.error, intent };
      }
      return { kind: 'empty', reason: 'no_results', intent };
    }
    return { kind: 'data', data, intent };
  }

  async getSports(): Promise<JsonValue[]> {
    return this.list('/sports', {});
  }

  async getTournaments(sport?: string): Promise<JsonValue[]> {
    return this.list('/sports/tournaments', { sport });
  }

  async isConnected(): Promise<boolean> {
    try {
      const response = await this.http.get('/sports', { timeout: Math.min(this.config.timeoutMs, 10_000) });
      return response.status === 200;
    } catch (error) {
      logger.debug(`health probe failed: ${describeError(error)}`);
      return false;
    }
  }

  private async list(path: string, params: Record<string, string | number | undefined>): Promise<JsonValue[]> {
    const response = await this.request(path, params);
    return response.ok ? toList(response.payload) : [];
  }

  private async request(path: string, params: Record<string, string | number | undefined>): Promise<Fetched> {
    try {
      const response = await this.http.get<JsonValue>(path, { params: compactParams(params) });
      return { ok: true, payload: response.data ?? null };
    } catch (error) {
      const detail = axios.isAxiosError(error)
        ? error.response
          ? `status ${error.response.status}`
          : error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT'
            ? 'timeout'
            : error.message
        : describeError(error);
      logger.warn(`GET ${path} failed: ${detail}`);
      return { ok: false, error: new UpstreamUnavailableError('sports', `GET ${path} failed: ${detail}`, error) };
    }
  }
}
