// tests/runtime/dispatcher.test.ts
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { z } from 'zod';
import { createApp, type App } from '../../src/runtime/app';
import { defineState } from '../../src/state/define';
import { MemoryStateManager } from '../../src/state/manager';
import type { StateNode } from '../../src/state/node';
import { StateRegistry } from '../../src/state/registry';
import {
  EventSpec,
  consoleLog,
  emptyRouterData,
  windowAlert,
} from '../../src/events/event';
import { createRecordingSink } from '../helpers/updates';

const Chain = defineState('chain', {
  order: z.array(z.string()),
  count: z.number(),
  bad: z.boolean(),
})
  .computed('checked', (s) => {
    if (s.bad) throw new Error('bad value');
    return 'ok';
  })
  .event('noArg', (s) => {
    s.order.push('noArg');
  })
  .event('eventArg', { arg: z.number() }, (s, { arg }) => {
    s.order.push(`arg${arg}`);
  })
  .event('returnChain', (s) => {
    s.order.push('return');
    return [
      new EventSpec('chain.eventArg', { arg: 1 }),
      new EventSpec('chain.noArg'),
    ];
  })
  .event('yieldChain', function* (s) {
    s.order.push(':0');
    yield new EventSpec('chain.eventArg', { arg: 10 });
    s.order.push(':1');
    yield [new EventSpec('chain.eventArg', { arg: 11 }), consoleLog('hi')];
    s.order.push(':2');
  })
  .event('nestedOuter', function* (s) {
    s.order.push('outer:0');
    yield new EventSpec('chain.nestedInner');
    s.order.push('outer:1');
  })
  .event('nestedInner', function* (s) {
    s.order.push('inner:0');
    yield new EventSpec('chain.noArg');
    s.order.push('inner:1');
  })
  .event('logThenWork', function* (s) {
    yield consoleLog('first');
    s.count = 1;
  })
  .event('explode', (s) => {
    s.order.push('before');
    throw new Error('kaboom');
  })
  .event('yieldThenFail', function* (s) {
    s.order.push('a');
    yield;
    throw new Error('late');
  })
  .event('abortChain', () => [
    new EventSpec('chain.explode'),
    new EventSpec('chain.noArg'),
  ])
  .event('breakComputed', (s) => {
    s.bad = true;
  })
  .event('again', (s) => {
    s.count += 1;
    return new EventSpec('chain.again');
  })
  .event('slowIncrement', async (s) => {
    const current = s.count;
    await new Promise((resolve) => setTimeout(resolve, 1));
    s.count = current + 1;
  });

const TOKEN = 'token-1';

function event(name: string, payload: Record<string, unknown> | unknown[] = {}) {
  return { token: TOKEN, name, payload, routerData: emptyRouterData() };
}

describe('event dispatch (DISPATCH)', () => {
  let recorder = createRecordingSink();
  let app: App;

  beforeEach(() => {
    recorder = createRecordingSink();
    app = createApp({ states: [Chain], sink: recorder.sink });
  });

  afterEach(async () => {
    await app.shutdown();
    vi.restoreAllMocks();
  });

  const updates = () => recorder.updates.map(({ update }) => update);
  const order = async () => (await app.getState(TOKEN)).get('order');

  it('should run returned events after the delta of the returning handler', async () => {
    await app.dispatch(event('chain.returnChain'));

    expect(recorder.deltas()).toEqual([
      { chain: { order: ['return'] } },
      { chain: { order: ['return', 'arg1'] } },
      { chain: { order: ['return', 'arg1', 'noArg'] } },
    ]);
    expect(updates().map((u) => u.processing)).toEqual([
      true,
      true,
      true,
      false,
    ]);
    expect(recorder.updates.every((u) => u.token === TOKEN)).toBe(true);
  });

  it('should drain yielded events before resuming the generator', async () => {
    await app.dispatch(event('chain.yieldChain'));

    expect(updates()).toEqual([
      { delta: { chain: { order: [':0'] } }, events: [], processing: true },
      {
        delta: { chain: { order: [':0', 'arg10'] } },
        events: [],
        processing: true,
      },
      {
        delta: { chain: { order: [':0', 'arg10', ':1'] } },
        events: [],
        processing: true,
      },
      {
        delta: { chain: { order: [':0', 'arg10', ':1', 'arg11'] } },
        events: [],
        processing: true,
      },
      {
        delta: {},
        events: [{ name: '_console', payload: { message: 'hi' } }],
        processing: true,
      },
      {
        delta: { chain: { order: [':0', 'arg10', ':1', 'arg11', ':2'] } },
        events: [],
        processing: true,
      },
      { delta: {}, events: [], processing: false },
    ]);
  });

  it('should finish a nested yield chain before resuming the outer handler', async () => {
    await app.dispatch(event('chain.nestedOuter'));

    expect(recorder.deltas()).toEqual([
      { chain: { order: ['outer:0'] } },
      { chain: { order: ['outer:0', 'inner:0'] } },
      { chain: { order: ['outer:0', 'inner:0', 'noArg'] } },
      { chain: { order: ['outer:0', 'inner:0', 'noArg', 'inner:1'] } },
      {
        chain: { order: ['outer:0', 'inner:0', 'noArg', 'inner:1', 'outer:1'] },
      },
    ]);
  });

  it('should send yielded client events before the handler resumes', async () => {
    await app.dispatch(event('chain.logThenWork'));

    expect(updates()).toEqual([
      {
        delta: {},
        events: [{ name: '_console', payload: { message: 'first' } }],
        processing: true,
      },
      { delta: { chain: { count: 1 } }, events: [], processing: true },
      { delta: {}, events: [], processing: false },
    ]);
  });

  it('should bind positional payloads', async () => {
    await app.dispatch(event('chain.eventArg', [7]));
    expect(await order()).toEqual(['arg7']);
  });

  it('should send an error event when the payload does not validate', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    await app.dispatch(event('chain.eventArg', { arg: 'x' }));

    expect(updates()).toEqual([
      {
        delta: {},
        events: [
          {
            name: '_error',
            payload: {
              type: 'EventPayloadError',
              code: 'EVENT_PAYLOAD',
              message:
                "Invalid payload for 'chain.eventArg': arg: Expected number, received string",
            },
          },
        ],
        processing: false,
      },
    ]);
    expect(warn).toHaveBeenCalledWith(
      "[Tether] Invalid payload for 'chain.eventArg': arg: Expected number, received string"
    );
  });

  it('should reject unknown payload arguments', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});

    await app.dispatch(event('chain.eventArg', { arg: 1, extra: 2 }));

    const [final] = updates();
    expect(final?.events[0]?.payload.message).toBe(
      "Invalid payload for 'chain.eventArg': unexpected argument(s) 'extra'"
    );
    expect(await order()).toEqual([]);
  });

  it('should skip unknown handlers with a warning', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    await app.dispatch(event('chain.missing'));

    expect(warn).toHaveBeenCalledWith(
      "[Tether] No event handler named 'chain.missing'"
    );
    expect(updates()).toEqual([{ delta: {}, events: [], processing: false }]);
  });

  it('should flush partial changes and report a failing handler', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    await app.dispatch(event('chain.explode'));

    expect(updates()).toEqual([
      {
        delta: { chain: { order: ['before'] } },
        events: [
          {
            name: '_error',
            payload: {
              type: 'HandlerExecutionError',
              code: 'HANDLER_EXECUTION',
              message: "Event handler 'chain.explode' failed: kaboom",
            },
          },
        ],
        processing: false,
      },
    ]);
    expect(error).toHaveBeenCalledWith(
      "[Tether] Event chain for token 'token-1' aborted:",
      expect.any(Error)
    );
  });

  it('should keep deltas sent before a failure after a yield', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});

    await app.dispatch(event('chain.yieldThenFail'));

    const sent = updates();
    expect(sent).toHaveLength(2);
    expect(sent[0]).toEqual({
      delta: { chain: { order: ['a'] } },
      events: [],
      processing: true,
    });
    expect(sent[1]?.events[0]?.payload.message).toBe(
      "Event handler 'chain.yieldThenFail' failed: late"
    );
    expect(await order()).toEqual(['a']);
  });

  it('should abort the rest of the chain after a failure', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});

    await app.dispatch(event('chain.abortChain'));

    expect(await order()).toEqual(['before']);
    expect(updates()).toHaveLength(1);
  });

  it('should report computed var failures by name', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});

    await app.dispatch(event('chain.breakComputed'));

    expect(updates()).toEqual([
      {
        delta: {},
        events: [
          {
            name: '_error',
            payload: {
              type: 'ComputedVarError',
              code: 'COMPUTED_VAR',
              message: "Computed var 'chain.checked' failed: bad value",
            },
          },
        ],
        processing: false,
      },
    ]);
  });

  it('should update plain vars through setvar', async () => {
    await app.dispatch(event('chain.setvar', { var: 'count', value: 5 }));
    expect(recorder.deltas()).toEqual([{ chain: { count: 5 } }]);
  });

  it('should serialize events of one token', async () => {
    await Promise.all(
      Array.from({ length: 10 }, () => app.dispatch(event('chain.slowIncrement')))
    );
    expect((await app.getState(TOKEN)).get('count')).toBe(10);
  });

  it('should stop chains deeper than the configured limit', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const shallow = createApp({
      states: [Chain],
      sink: recorder.sink,
      config: { maxChainDepth: 3 },
    });

    await shallow.dispatch(event('chain.again'));

    expect((await shallow.getState(TOKEN)).get('count')).toBe(4);
    const sent = updates();
    expect(sent.at(-1)).toEqual({
      delta: {},
      events: [
        {
          name: '_error',
          payload: {
            type: 'Error',
            code: null,
            message:
              "[Tether Invariant] [Dispatch Precondition] Event chain deeper than 3 steps at 'chain.again'",
          },
        },
      ],
      processing: false,
    });
    await shallow.shutdown();
  });
});

describe('backend error hook (DISPATCH)', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should send the events returned by onBackendError instead', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const recorder = createRecordingSink();
    const app = createApp({
      states: [Chain],
      sink: recorder.sink,
      onBackendError: (error) => [
        new EventSpec('chain.noArg'),
        windowAlert(`oops: ${error instanceof Error ? error.message : ''}`),
      ],
    });

    await app.dispatch(event('chain.explode'));

    const [final] = recorder.updates;
    expect(final?.update.events).toEqual([
      {
        name: '_alert',
        payload: { message: "oops: Event handler 'chain.explode' failed: kaboom" },
      },
    ]);
    expect(warn).toHaveBeenCalledWith(
      "[Tether] onBackendError returned server event 'chain.noArg'; only client events are sent"
    );
    expect((await app.getState(TOKEN)).get('order')).toEqual(['before']);
    await app.shutdown();
  });
});

class UnsavableManager extends MemoryStateManager {
  async setState(): Promise<void> {
    throw new Error('disk full');
  }
}

class UnloadableManager extends MemoryStateManager {
  async getState(): Promise<StateNode> {
    throw new Error('unreadable');
  }
}

describe('state persistence failures (DISPATCH)', () => {
  const registry = new StateRegistry([Chain]);
  const managerOptions = { tokenExpiration: 3600 };

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should report a failed save to the client instead of rejecting', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const recorder = createRecordingSink();
    const app = createApp({
      states: [Chain],
      sink: recorder.sink,
      manager: new UnsavableManager(registry, managerOptions),
    });

    await expect(app.dispatch(event('chain.noArg'))).resolves.toBeUndefined();

    expect(recorder.updates.map(({ update }) => update)).toEqual([
      { delta: { chain: { order: ['noArg'] } }, events: [], processing: true },
      { delta: {}, events: [], processing: false },
      {
        delta: {},
        events: [
          {
            name: '_error',
            payload: { type: 'Error', code: null, message: 'disk full' },
          },
        ],
        processing: false,
      },
    ]);
    expect(error).toHaveBeenCalledWith(
      "[Tether] Could not save state for token 'token-1':",
      expect.any(Error)
    );
    await app.shutdown();
  });

  it('should report a failed load without running the handler', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const recorder = createRecordingSink();
    const app = createApp({
      states: [Chain],
      sink: recorder.sink,
      manager: new UnloadableManager(registry, managerOptions),
    });

    await expect(app.dispatch(event('chain.noArg'))).resolves.toBeUndefined();
    await expect(app.hydrate(TOKEN)).resolves.toBeUndefined();

    const failure = {
      delta: {},
      events: [
        {
          name: '_error',
          payload: { type: 'Error', code: null, message: 'unreadable' },
        },
      ],
      processing: false,
    };
    expect(recorder.updates.map(({ update }) => update)).toEqual([
      failure,
      failure,
    ]);
    expect(error).toHaveBeenCalledWith(
      "[Tether] Could not load state for token 'token-1':",
      expect.any(Error)
    );
    await app.shutdown();
  });
});
