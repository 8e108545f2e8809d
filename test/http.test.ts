/**
 * HTTP API tests against an in-memory store.
 *
 * Requests go straight to `app.fetch`; no server is started.
 */

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { createApp, type App } from '../src/index.js';
import { DAY_MS, type Clock } from '../src/domain/clock.js';
import { MemoryStateStore, type StateStore } from '../src/infra/stateStore.js';
import { createLogger } from '../src/infra/logger.js';
import type { GameState } from '../src/domain/state.js';

// ============================================================================
// Test Helpers
// ============================================================================

const NOW = Date.UTC(2024, 0, 10, 12);
const NEXT_WEEK = Date.UTC(2024, 0, 15);

const IdBody = z.object({
  skillId: z.string().optional(),
  missionId: z.string().optional(),
  rewardId: z.string().optional(),
  capsuleId: z.string().optional(),
});
const ErrorBody = z.object({ error: z.string(), message: z.string() });
const CardsBody = z.object({
  state: z.object({ skills: z.array(z.record(z.unknown())) }),
});
const EventsBody = z.object({ events: z.array(z.record(z.unknown())) });

interface Harness {
  app: App;
  setNow(ms: number): void;
  call(method: string, path: string, body?: unknown, cookie?: string): Promise<Response>;
}

function harness(store: StateStore = new MemoryStateStore()): Harness {
  let nowMs = NOW;
  let counter = 0;
  const clock: Clock = { nowMs: () => nowMs };
  const app = createApp({
    store,
    clock,
    rng: { next: () => 0.99 },
    newId: () => `id-${++counter}`,
    logger: createLogger('silent'),
  });

  return {
    app,
    setNow: (ms) => {
      nowMs = ms;
    },
    call(method, path, body, cookie) {
      const headers = new Headers();
      if (body !== undefined) headers.set('Content-Type', 'application/json');
      if (cookie) headers.set('Cookie', cookie);
      return app.fetch(
        new Request(`http://localhost${path}`, {
          method,
          headers,
          ...(body !== undefined ? { body: typeof body === 'string' ? body : JSON.stringify(body) } : {}),
        })
      );
    },
  };
}

async function ids(res: Response): Promise<z.infer<typeof IdBody>> {
  return IdBody.parse(await res.json());
}

/**
 * A skill with eight missions, rolled into an ACTIVE window at NEXT_WEEK.
 */
async function readyHarness(store?: StateStore) {
  const h = harness(store);
  const { skillId } = await ids(await h.call('POST', '/api/skills', { name: 'Writing' }));
  if (!skillId) throw new Error('no skill id');

  const missionIds: string[] = [];
  for (let i = 0; i < 8; i++) {
    const res = await h.call('POST', '/api/missions', {
      title: `Draft ${i}`,
      skillIds: [skillId],
      difficulty: 3,
      energy: 2,
    });
    const { missionId } = await ids(res);
    if (!missionId) throw new Error('no mission id');
    missionIds.push(missionId);
  }

  h.setNow(NEXT_WEEK);
  const tick = await h.call('POST', '/api/tick');
  return { h, skillId, missionIds, tick };
}

// ============================================================================
// Routes
// ============================================================================

describe('HTTP API', () => {
  it('creates the player on first read', async () => {
    const res = await harness().call('GET', '/api/state');

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      state: { revision: 1, player: { id: 'id-1', displayName: 'Player', level: 1, xp: 0, xpNeeded: 120 } },
    });
  });

  it('hides cycle targets unless the player opted in', async () => {
    const { h, missionIds, tick } = await readyHarness();

    const tickEvents = EventsBody.parse(await tick.json()).events;
    expect(tickEvents.map((e) => e.type)).toEqual(['cycle_closed', 'cycle_opened']);
    expect(tickEvents[1]).not.toHaveProperty('targetMissionId');

    const hidden = CardsBody.parse(await (await h.call('GET', '/api/state')).json());
    expect(hidden.state.skills[0]).toMatchObject({ status: 'ACTIVE', assignedMissionCount: 8 });
    expect(hidden.state.skills[0]).not.toHaveProperty('targetMissionId');

    const shown = CardsBody.parse(await (await h.call('GET', '/api/state', undefined, 'revealTargets=1')).json());
    expect(shown.state.skills[0].targetMissionId).toBe(missionIds[7]);
  });

  it('does not reveal that an archived mission was the target', async () => {
    const { h, missionIds } = await readyHarness();
    const hidden = await h.call('POST', `/api/missions/${missionIds[7]}/archive`);
    const hiddenTypes = EventsBody.parse(await hidden.json()).events.map((e) => e.type);
    expect(hiddenTypes).toEqual(['mission_archived']);

    const shown = await h.call(
      'POST',
      `/api/missions/${missionIds[6]}/archive`,
      undefined,
      'revealTargets=1'
    );
    expect(EventsBody.parse(await shown.json()).events).toEqual([
      { type: 'mission_archived', missionId: missionIds[6] },
      expect.objectContaining({ type: 'target_reseeded' }),
    ]);
  });

  it('pays the cycle bonus through the completion route', async () => {
    const { h, missionIds } = await readyHarness();
    const res = await h.call('POST', `/api/missions/${missionIds[7]}/complete`);

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      award: { basePlayerXp: 12, cyclePlayerXp: 120, coins: 6 },
      state: { player: { level: 2, xp: 12, coins: 6 } },
      narrative: { title: 'Cycle target hit' },
    });
  });

  it('reports streaks and skill metrics on the state', async () => {
    const { h, missionIds } = await readyHarness();
    await h.call('POST', `/api/missions/${missionIds[7]}/complete`);

    expect(await (await h.call('GET', '/api/state')).json()).toMatchObject({
      state: {
        player: { streak: { current: 1, longest: 1, isActive: true, atRisk: false } },
        skills: [
          {
            streak: { current: 1, lastCompletionDayMs: NEXT_WEEK },
            metrics: {
              variety: { score: 0, rating: 'low', completedMissions: 1, assignedMissions: 8 },
              consistency: { score: 1, rating: 'excellent', cyclesHit: 1, cyclesCounted: 1 },
            },
          },
        ],
        skillsWithActiveStreak: 1,
        skillsWithStreakAtRisk: 0,
      },
    });
  });

  it('sets and clears the reveal cookie', async () => {
    const h = harness();
    const on = await h.call('POST', '/api/preferences/reveal', { reveal: true });
    const off = await h.call('POST', '/api/preferences/reveal', { reveal: false });

    expect(on.headers.get('Set-Cookie')).toContain('revealTargets=1');
    expect(on.headers.get('Set-Cookie')).toContain('Max-Age=31536000');
    expect(off.headers.get('Set-Cookie')).toContain('Max-Age=0');
  });

  it('keeps sealed capsule bodies out of responses', async () => {
    const h = harness();
    const { capsuleId } = await ids(
      await h.call('POST', '/api/capsules', {
        title: 'Later',
        body: 'hello from the past',
        condition: { type: 'date', unlockAtMs: NOW + DAY_MS },
      })
    );

    const sealed = await (await h.call('GET', `/api/capsules/${capsuleId}`)).json();
    expect(sealed).toMatchObject({ capsule: { isUnlocked: false } });
    expect(sealed).not.toHaveProperty('capsule.body');

    h.setNow(NOW + DAY_MS);
    await h.call('POST', '/api/tick');
    expect(await (await h.call('GET', `/api/capsules/${capsuleId}`)).json()).toMatchObject({
      capsule: { isUnlocked: true, body: 'hello from the past' },
    });
  });

  it('serves navigator suggestions', async () => {
    const h = harness();
    await h.call('POST', '/api/skills', { name: 'Writing' });
    await h.call('POST', '/api/skills', { name: 'Fitness' });

    expect(await (await h.call('GET', '/api/navigator')).json()).toEqual({
      suggestions: [expect.objectContaining({ kind: 'focus_saturation', priority: 'low' })],
    });
  });

  it('answers the health check and unknown paths', async () => {
    const h = harness();
    expect(await (await h.call('GET', '/')).text()).toBe('Mission cycle engine alive');

    const missing = await h.call('GET', '/api/nothing');
    expect(missing.status).toBe(404);
    expect(await missing.text()).toBe('Not Found');
  });

  it('answers CORS preflight for known origins', async () => {
    const h = harness();
    const res = await h.app.fetch(
      new Request('http://localhost/api/state', {
        method: 'OPTIONS',
        headers: { Origin: 'http://localhost:5173' },
      })
    );

    expect(res.status).toBe(204);
    expect(res.headers.get('Access-Control-Allow-Origin')).toBe('http://localhost:5173');
  });
});

// ============================================================================
// Errors
// ============================================================================

describe('HTTP errors', () => {
  it('maps unknown ids to 404', async () => {
    const res = await harness().call('POST', '/api/missions/nope/complete');

    expect(res.status).toBe(404);
    expect(ErrorBody.parse(await res.json()).error).toBe('mission_not_found');
  });

  it('maps bad input to 400', async () => {
    const h = harness();
    const { skillId } = await ids(await h.call('POST', '/api/skills', { name: 'Writing' }));

    const bad = await h.call('POST', '/api/missions', {
      title: 'Too hard',
      skillIds: [skillId],
      difficulty: 9,
      energy: 1,
    });
    expect(bad.status).toBe(400);
    expect(ErrorBody.parse(await bad.json()).error).toBe('invalid_difficulty');

    const garbled = await h.call('POST', '/api/skills', '{"name":');
    expect(garbled.status).toBe(400);
    expect(ErrorBody.parse(await garbled.json()).error).toBe('invalid_request');

    const shape = await h.call('POST', '/api/skills', { name: 42 });
    expect(ErrorBody.parse(await shape.json())).toMatchObject({
      error: 'invalid_request',
      message: 'name: Expected string, received number',
    });
  });

  it('maps state violations to 409', async () => {
    const h = harness();
    const { rewardId } = await ids(await h.call('POST', '/api/rewards', { title: 'Tea', priceCoins: 5 }));
    const res = await h.call('POST', `/api/rewards/${rewardId}/redeem`);

    expect(res.status).toBe(409);
    expect(ErrorBody.parse(await res.json()).error).toBe('insufficient_coins');
  });

  it('rejects a write that lost a race and keeps the winner', async () => {
    const inner = new MemoryStateStore();
    const racing = new RacingStore(inner);
    const { h, missionIds } = await readyHarness(racing);
    const before = await inner.load();

    racing.interfereOnNextLoad = true;
    const res = await h.call('POST', `/api/missions/${missionIds[0]}/complete`);

    expect(res.status).toBe(409);
    expect(ErrorBody.parse(await res.json()).error).toBe('revision_conflict');
    const after = await inner.load();
    expect(after?.completions).toHaveLength(0);
    expect(after?.revision).toBe((before?.revision ?? 0) + 1);
  });
});

/**
 * Lets another writer commit between a request's load and its save.
 */
class RacingStore implements StateStore {
  interfereOnNextLoad = false;

  constructor(private readonly inner: StateStore) {}

  async load(): Promise<GameState | null> {
    const state = await this.inner.load();
    if (state && this.interfereOnNextLoad) {
      this.interfereOnNextLoad = false;
      await this.inner.save(state, state.revision);
    }
    return state;
  }

  save(state: GameState, expectedRevision: number): Promise<GameState> {
    return this.inner.save(state, expectedRevision);
  }
}

// ============================================================================
// Export and Import
// ============================================================================

describe('export and import', () => {
  it('moves the full record set, targets included, between stores', async () => {
    const { h, missionIds } = await readyHarness();
    await h.call('POST', `/api/missions/${missionIds[2]}/complete`);

    const exported = await h.call('GET', '/api/export');
    expect(exported.headers.get('Content-Disposition')).toBe('attachment; filename="state.json"');
    const text = await exported.text();
    expect(text).toContain(`"targetMissionId": "${missionIds[7]}"`);

    const target = harness();
    const imported = await target.call('POST', '/api/import', text);
    expect(imported.status).toBe(200);

    expect(await (await target.call('GET', '/api/state')).json()).toMatchObject({
      state: { completionCount: 1, player: { coins: 6 }, skills: [{ name: 'Writing' }] },
    });

    const cycleFields = z.object({
      skills: z.array(
        z.object({
          targetMissionId: z.string().nullable(),
          hasHitTargetThisCycle: z.boolean(),
          cycleStartMs: z.number().nullable(),
          cycleEndMs: z.number().nullable(),
        })
      ),
    });
    const reExported = await (await target.call('GET', '/api/export')).json();
    expect(cycleFields.parse(reExported)).toEqual(cycleFields.parse(JSON.parse(text)));
  });

  it('refuses a record set whose links are broken and keeps the current state', async () => {
    const { h } = await readyHarness();
    const exported = z
      .object({ skills: z.array(z.record(z.unknown())), missions: z.array(z.record(z.unknown())) })
      .passthrough()
      .parse(await (await h.call('GET', '/api/export')).json());

    const res = await h.call('POST', '/api/import', {
      ...exported,
      skills: [{ ...exported.skills[0], targetMissionId: 'ghost' }, exported.skills[0]],
      missions: [...exported.missions, { ...exported.missions[0], id: 'stray', skillIds: ['nope'] }],
    });

    expect(res.status).toBe(400);
    expect(ErrorBody.parse(await res.json()).error).toBe('invalid_stored_state');
    expect(await (await h.call('GET', '/api/state')).json()).toMatchObject({
      state: { skills: [{ name: 'Writing' }], missions: expect.any(Array) },
    });
  });

  it('rejects an invalid record set', async () => {
    const res = await harness().call('POST', '/api/import', { revision: 'one' });

    expect(res.status).toBe(400);
    expect(ErrorBody.parse(await res.json()).error).toBe('invalid_stored_state');
  });
});
