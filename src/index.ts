/**
 * Manual test instructions:
 *
 * npm start
 *
 * # Use a cookie jar so the reveal preference sticks across requests
 * curl -c cookies.txt -b cookies.txt http://localhost:8787/api/state
 *
 * # Create a skill, then a mission for it
 * curl -b cookies.txt -X POST http://localhost:8787/api/skills \
 *   -H 'Content-Type: application/json' -d '{"name":"Writing","cadence":{"kind":"weekly"}}'
 * curl -b cookies.txt -X POST http://localhost:8787/api/missions \
 *   -H 'Content-Type: application/json' \
 *   -d '{"title":"Draft 300 words","skillIds":["<skill id>"],"difficulty":3,"energy":2}'
 *
 * # Complete it
 * curl -b cookies.txt -X POST http://localhost:8787/api/missions/<mission id>/complete
 *
 * # Show hidden targets from now on
 * curl -c cookies.txt -X POST http://localhost:8787/api/preferences/reveal \
 *   -H 'Content-Type: application/json' -d '{"reveal":true}'
 */

import { randomUUID } from 'node:crypto';
import type { GameState, Settings } from './domain/state.js';
import type { EngineEvent } from './domain/events.js';
import type { EngineContext } from './domain/context.js';
import { systemClock, type Clock } from './domain/clock.js';
import { mathRandomRng, type Rng } from './domain/rng.js';
import { InvalidInputError, isEngineError, type ErrorKind } from './domain/errors.js';
import {
  analyze,
  archiveMission,
  archiveSkill,
  completeMission,
  createCapsule,
  createInitialState,
  createMission,
  createReward,
  createSkill,
  recordJournalEntry,
  redeemReward,
  requireCapsule,
  setCadence,
  tick,
  toggleFocus,
  updateSettings,
} from './domain/engine.js';
import { summarize } from './domain/narrative.js';
import { toCapsuleDTO, toEventDTOs, toStateDTO, type ViewOptions } from './http/dto.js';
import { readRevealTargets, revealTargetsCookie } from './http/cookies.js';
import {
  CreateCapsuleBody,
  CreateMissionBody,
  CreateRewardBody,
  CreateSkillBody,
  JournalEntryBody,
  readBody,
  RevealPreferenceBody,
  SetCadenceBody,
  UpdateSettingsBody,
} from './http/requests.js';
import { parseStoredState, serializeState } from './http/state-serialization.js';
import type { StateStore } from './infra/stateStore.js';
import { logger as defaultLogger, type Logger } from './infra/logger.js';

export interface AppOptions {
  store: StateStore;
  clock?: Clock;
  rng?: Rng;
  newId?: () => string;
  logger?: Logger;
  /** Settings for a state created on first use */
  initialSettings?: Partial<Settings>;
  displayName?: string;
  allowedOrigins?: string[];
}

export interface App {
  fetch(request: Request): Promise<Response>;
}

/**
 * A transition plus anything extra the route wants in the response.
 */
interface Mutation {
  state: GameState;
  events: EngineEvent[];
  extra?: Record<string, unknown>;
}

const STATUS_BY_KIND: Record<ErrorKind, number> = {
  NotFound: 404,
  InvalidInput: 400,
  StateViolation: 409,
  ConcurrencyConflict: 409,
};

const DEFAULT_ALLOWED_ORIGINS = ['http://localhost:5173', 'http://localhost:3000'];

/**
 * Adds CORS headers for known front-end origins.
 */
function addCorsHeaders(headers: Headers, request: Request, allowedOrigins: string[]): Headers {
  const origin = request.headers.get('Origin');

  if (origin && allowedOrigins.includes(origin)) {
    headers.set('Access-Control-Allow-Origin', origin);
    headers.set('Access-Control-Allow-Credentials', 'true');
    headers.set('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    headers.set('Access-Control-Allow-Headers', 'Content-Type');
    headers.set('Access-Control-Max-Age', '86400');
  }

  return headers;
}

function errorResponse(error: unknown, log: Logger): Response {
  if (isEngineError(error)) {
    return Response.json(
      { error: error.code, message: error.message },
      { status: STATUS_BY_KIND[error.kind] }
    );
  }
  log.error('http', 'Unhandled error', error);
  return Response.json({ error: 'internal_error', message: 'Internal error' }, { status: 500 });
}

export function createApp(options: AppOptions): App {
  const store = options.store;
  const clock = options.clock ?? systemClock;
  const rng = options.rng ?? mathRandomRng;
  const newId = options.newId ?? (() => randomUUID());
  const log = options.logger ?? defaultLogger;
  const allowedOrigins = options.allowedOrigins ?? DEFAULT_ALLOWED_ORIGINS;

  function context(): EngineContext {
    return { nowMs: clock.nowMs(), rng, newId };
  }

  /**
   * Latest state, creating and committing a fresh one on first use.
   */
  async function loadOrCreate(ctx: EngineContext): Promise<GameState> {
    const existing = await store.load();
    if (existing) {
      return existing;
    }
    const initial = createInitialState(
      {
        displayName: options.displayName ?? 'Player',
        ...(options.initialSettings ? { settings: options.initialSettings } : {}),
      },
      ctx
    );
    log.info('app', 'Created initial state');
    return store.save(initial, 0);
  }

  function json(body: unknown, request: Request, init?: { status?: number; headers?: Headers }): Response {
    const headers = new Headers(init?.headers);
    headers.set('Content-Type', 'application/json');
    addCorsHeaders(headers, request, allowedOrigins);
    return new Response(JSON.stringify(body), { status: init?.status ?? 200, headers });
  }

  /**
   * Load → transition → save at the loaded revision.
   *
   * A concurrent writer makes the save fail with a conflict; nothing from
   * this request is kept.
   */
  async function mutate(
    request: Request,
    run: (state: GameState, ctx: EngineContext) => Mutation | Promise<Mutation>
  ): Promise<Response> {
    const ctx = context();
    const loaded = await loadOrCreate(ctx);
    const result = await run(loaded, ctx);
    const committed = await store.save(result.state, loaded.revision);

    const view: ViewOptions = { revealTargets: readRevealTargets(request) };
    return json(
      {
        ...result.extra,
        state: toStateDTO(committed, ctx.nowMs, view),
        events: toEventDTOs(result.events, view),
        narrative: summarize(result.events, committed),
      },
      request
    );
  }

  async function route(request: Request, url: URL): Promise<Response> {
    const { pathname } = url;
    const method = request.method;
    let match: RegExpMatchArray | null;

    // GET /api/state - current state; targets hidden unless revealed
    if (pathname === '/api/state' && method === 'GET') {
      const ctx = context();
      const state = await loadOrCreate(ctx);
      const view: ViewOptions = { revealTargets: readRevealTargets(request) };
      return json({ state: toStateDTO(state, ctx.nowMs, view) }, request);
    }

    // POST /api/tick - roll over due cycles, check date capsules
    if (pathname === '/api/tick' && method === 'POST') {
      return mutate(request, (state, ctx) => tick(state, ctx));
    }

    if (pathname === '/api/skills' && method === 'POST') {
      const body = await readBody(request, CreateSkillBody);
      return mutate(request, (state, ctx) => {
        const result = createSkill(state, body, ctx);
        return { ...result, extra: { skillId: result.skill.id } };
      });
    }

    match = pathname.match(/^\/api\/skills\/([^/]+)\/(focus|cadence|archive)$/);
    if (match && method === 'POST') {
      const skillId = decodeURIComponent(match[1]);
      switch (match[2]) {
        case 'focus':
          return mutate(request, (state, ctx) => toggleFocus(state, skillId, ctx));
        case 'archive':
          return mutate(request, (state) => archiveSkill(state, skillId));
        default: {
          const body = await readBody(request, SetCadenceBody);
          return mutate(request, (state, ctx) => setCadence(state, skillId, body.cadence, ctx));
        }
      }
    }

    if (pathname === '/api/missions' && method === 'POST') {
      const body = await readBody(request, CreateMissionBody);
      return mutate(request, (state, ctx) => {
        const result = createMission(state, body, ctx);
        return { ...result, extra: { missionId: result.mission.id } };
      });
    }

    match = pathname.match(/^\/api\/missions\/([^/]+)\/(complete|archive)$/);
    if (match && method === 'POST') {
      const missionId = decodeURIComponent(match[1]);
      if (match[2] === 'archive') {
        return mutate(request, (state, ctx) => archiveMission(state, missionId, ctx));
      }
      return mutate(request, (state, ctx) => {
        const result = completeMission(state, missionId, ctx);
        return {
          ...result,
          extra: { completionId: result.completion.id, award: result.completion.award },
        };
      });
    }

    if (pathname === '/api/rewards' && method === 'POST') {
      const body = await readBody(request, CreateRewardBody);
      return mutate(request, (state, ctx) => {
        const result = createReward(state, body, ctx);
        return { ...result, extra: { rewardId: result.reward.id } };
      });
    }

    match = pathname.match(/^\/api\/rewards\/([^/]+)\/redeem$/);
    if (match && method === 'POST') {
      const rewardId = decodeURIComponent(match[1]);
      return mutate(request, (state, ctx) => redeemReward(state, rewardId, ctx));
    }

    if (pathname === '/api/journal' && method === 'POST') {
      const body = await readBody(request, JournalEntryBody);
      return mutate(request, (state, ctx) => {
        const result = recordJournalEntry(state, body, ctx);
        return { ...result, extra: { entryId: result.entry.id } };
      });
    }

    if (pathname === '/api/capsules' && method === 'POST') {
      const body = await readBody(request, CreateCapsuleBody);
      return mutate(request, (state, ctx) => {
        const result = createCapsule(state, body, ctx);
        return { ...result, extra: { capsuleId: result.capsule.id } };
      });
    }

    match = pathname.match(/^\/api\/capsules\/([^/]+)$/);
    if (match && method === 'GET') {
      const state = await loadOrCreate(context());
      const capsule = requireCapsule(state, decodeURIComponent(match[1]));
      return json({ capsule: toCapsuleDTO(capsule) }, request);
    }

    // GET /api/navigator - ranked suggestions, read-only
    if (pathname === '/api/navigator' && method === 'GET') {
      const ctx = context();
      const state = await loadOrCreate(ctx);
      return json({ suggestions: analyze(state, ctx.nowMs) }, request);
    }

    if (pathname === '/api/settings' && method === 'POST') {
      const body = await readBody(request, UpdateSettingsBody);
      return mutate(request, (state) => updateSettings(state, body));
    }

    if (pathname === '/api/preferences/reveal' && method === 'POST') {
      const body = await readBody(request, RevealPreferenceBody);
      const headers = revealTargetsCookie(new Headers(), body.reveal, url.protocol === 'https:');
      return json({ revealTargets: body.reveal }, request, { headers });
    }

    // GET /api/export - the full record set, targets included
    if (pathname === '/api/export' && method === 'GET') {
      const state = await loadOrCreate(context());
      const headers = new Headers({ 'Content-Disposition': 'attachment; filename="state.json"' });
      addCorsHeaders(headers, request, allowedOrigins);
      headers.set('Content-Type', 'application/json');
      return new Response(serializeState(state), { headers });
    }

    // POST /api/import - replaces everything with a validated record set
    if (pathname === '/api/import' && method === 'POST') {
      let raw: unknown;
      try {
        raw = await request.json();
      } catch {
        throw new InvalidInputError('invalid_request', 'Request body must be JSON');
      }
      const imported = parseStoredState(raw);
      return mutate(request, (state) => {
        log.info('app', `Importing ${imported.completions.length} completions`);
        return { state: { ...imported, revision: state.revision }, events: [] };
      });
    }

    // GET / - simple health check
    if (pathname === '/' && method === 'GET') {
      return new Response('Mission cycle engine alive');
    }

    return new Response('Not Found', { status: 404 });
  }

  return {
    async fetch(request: Request): Promise<Response> {
      const url = new URL(request.url);

      if (request.method === 'OPTIONS') {
        const headers = addCorsHeaders(new Headers(), request, allowedOrigins);
        return new Response(null, { headers, status: 204 });
      }

      try {
        return await route(request, url);
      } catch (error) {
        if (isEngineError(error)) {
          log.debug('http', `${request.method} ${url.pathname} -> ${error.code}`);
        }
        return errorResponse(error, log);
      }
    },
  };
}
