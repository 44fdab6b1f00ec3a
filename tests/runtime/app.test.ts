// tests/runtime/app.test.ts
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import { createApp, parseMessage, type App } from '../../src/runtime/app';
import { defineState } from '../../src/state/define';
import { DiskStateManager } from '../../src/state/manager';
import { createSerializerRegistry } from '../../src/state/serializers';
import { clientStorage } from '../../src/vars/storage';
import { InvalidMessageError } from '../../src/common/errors';
import { createRecordingSink } from '../helpers/updates';

const Site = defineState('site', {
  theme: clientStorage(z.string().default('light'), { kind: 'local' }),
  visits: clientStorage(z.number().default(0), {
    kind: 'cookie',
    name: 'visits',
  }),
  path: z.string(),
  due: z.coerce.date().nullable(),
  _secret: z.string(),
})
  .computed('label', (s) => `theme:${s.theme}`)
  .event('recordPath', (s) => {
    s.path = s.$router.path;
  });

describe('message parsing (APP)', () => {
  it('should map wire fields and apply defaults', () => {
    expect(
      parseMessage({
        token: 't1',
        name: 'site.recordPath',
        router_data: { client_ip: '127.0.0.1', query: { q: 'x' } },
      })
    ).toEqual({
      token: 't1',
      name: 'site.recordPath',
      payload: {},
      routerData: {
        path: '/',
        query: { q: 'x' },
        headers: {},
        clientIp: '127.0.0.1',
        sessionId: null,
      },
    });
  });

  it('should accept JSON text and positional payloads', () => {
    const event = parseMessage('{"token":"t1","name":"site.x","payload":[1,2]}');
    expect(event.payload).toEqual([1, 2]);
  });

  it('should reject malformed messages', () => {
    expect(() => parseMessage('{not json')).toThrow(InvalidMessageError);
    expect(() => parseMessage('{not json')).toThrow(
      /^Message is not valid JSON: /
    );
    expect(() => parseMessage({ name: 'site.x' })).toThrow(
      'Invalid message: token: Required'
    );
    expect(() => parseMessage({ token: '', name: 'site.x' })).toThrow(
      'Invalid message: token: String must contain at least 1 character(s)'
    );
  });
});

describe('app facade (APP)', () => {
  let recorder = createRecordingSink();
  let app: App;

  beforeEach(() => {
    recorder = createRecordingSink();
    app = createApp({ states: [Site], sink: recorder.sink });
  });

  afterEach(async () => {
    await app.shutdown();
    vi.restoreAllMocks();
  });

  it('should dispatch validated messages with their router data', async () => {
    await app.handleMessage(
      JSON.stringify({
        token: 't1',
        name: 'site.recordPath',
        router_data: { path: '/docs' },
      })
    );
    expect(recorder.deltas()).toEqual([{ site: { path: '/docs' } }]);
    expect(recorder.updates.at(-1)?.update.processing).toBe(false);
  });

  it('should reject invalid messages without dispatching', async () => {
    await expect(app.handleMessage({ token: 't1' })).rejects.toThrow(
      'Invalid message: name: Required'
    );
    expect(recorder.updates).toEqual([]);
  });

  it('should coerce setvar values with the var schema', async () => {
    await app.handleMessage({
      token: 't1',
      name: 'site.setvar',
      payload: { var: 'due', value: '2024-03-04T00:00:00.000Z' },
    });
    expect(recorder.deltas()).toEqual([
      { site: { due: '2024-03-04T00:00:00.000Z' } },
    ]);
    expect((await app.getState('t1')).get('due')).toEqual(
      new Date('2024-03-04T00:00:00.000Z')
    );
  });

  it('should refuse client writes to backend-only vars', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});

    await app.handleMessage({
      token: 't1',
      name: 'site.setvar',
      payload: { var: '_secret', value: 'x' },
    });

    expect(recorder.updates[0]?.update.events).toEqual([
      {
        name: '_error',
        payload: {
          type: 'EventPayloadError',
          code: 'EVENT_PAYLOAD',
          message:
            "Invalid payload for 'site.setvar': '_secret' is backend-only and cannot be set by the client",
        },
      },
    ]);
    expect((await app.getState('t1')).get('_secret')).toBe('');
  });

  it('should describe client storage vars', () => {
    expect(app.storageDescriptors()).toEqual([
      {
        state: 'site',
        var: 'theme',
        key: 'site.theme',
        kind: 'local',
        options: { path: '/' },
      },
      {
        state: 'site',
        var: 'visits',
        key: 'visits',
        kind: 'cookie',
        options: { path: '/' },
      },
    ]);
  });

  it('should apply storage values and send the full state on hydration', async () => {
    await app.hydrate('t1', { 'site.theme': 'dark', visits: 3 });

    expect(recorder.updates.map(({ update }) => update)).toEqual([
      {
        delta: {
          site: {
            theme: 'dark',
            visits: 3,
            path: '',
            due: null,
            label: 'theme:dark',
          },
        },
        events: [],
        processing: false,
      },
    ]);
    expect((await app.getState('t1')).dirtyVars.size).toBe(0);
  });

  it('should route the hydrate message to hydration', async () => {
    await app.handleMessage({
      token: 't1',
      name: 'site.hydrate',
      payload: { visits: 2 },
      router_data: { path: '/start' },
    });

    const [first] = recorder.updates;
    expect(first?.update.delta.site?.visits).toBe(2);
    expect((await app.getState('t1')).context.router.path).toBe('/start');
  });

  it('should ignore storage values that do not match the schema', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    await app.hydrate('t1', { 'site.theme': 42 });

    expect(warn).toHaveBeenCalledWith(
      expect.stringMatching(
        /^\[Tether\] Ignoring client local value for 'site\.theme': /
      )
    );
    expect(recorder.updates[0]?.update.delta.site?.theme).toBe('light');
  });

  it('should forget evicted tokens', async () => {
    await app.getState('t1');
    await app.evict('t1');
    expect(await app.manager.hasState('t1')).toBe(false);
  });
});

describe('disk-backed app (APP)', () => {
  let dir = '';

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'tether-app-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should persist state across app instances', async () => {
    const config = { stateManager: 'disk', stateDir: dir } as const;
    const first = createApp({
      states: [Site],
      sink: createRecordingSink().sink,
      config,
    });
    expect(first.manager).toBeInstanceOf(DiskStateManager);
    await first.handleMessage({
      token: 't1',
      name: 'site.setvar',
      payload: { var: 'path', value: '/saved' },
    });
    await first.shutdown();

    const second = createApp({
      states: [Site],
      sink: createRecordingSink().sink,
      config,
    });
    expect((await second.getState('t1')).get('path')).toBe('/saved');
    await second.shutdown();
  });

  it('should save registered class instances without failing the event', async () => {
    class Point {
      constructor(readonly x: number) {}
    }
    const Plot = defineState('plot', {
      p: z.instanceof(Point).nullable(),
    }).event('place', (s) => {
      s.p = new Point(1);
    });
    const recorder = createRecordingSink();
    const app = createApp({
      states: [Plot],
      sink: recorder.sink,
      config: { stateManager: 'disk', stateDir: dir },
      serializers: createSerializerRegistry().register(Point, (pt) => ({
        x: pt.x,
      })),
    });

    await expect(
      app.handleMessage({ token: 't1', name: 'plot.place' })
    ).resolves.toBeUndefined();

    expect(recorder.deltas()).toEqual([{ plot: { p: { x: 1 } } }]);
    expect(recorder.updates).toHaveLength(2);
    expect(recorder.updates.at(-1)?.update.events).toEqual([]);
    await app.shutdown();
  });
});
