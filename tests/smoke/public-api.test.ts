import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  createApp,
  defineState,
  consoleLog,
  type StateUpdate,
} from '../../src/index';

describe('public api (SMOKE)', () => {
  it('should run a counter end to end through the package entry', async () => {
    const Counter = defineState('counter', { count: z.number() })
      .computed('double', (s) => s.count * 2)
      .event('add', { amount: z.number() }, (s, { amount }) => {
        s.count += amount;
        return consoleLog(`added ${amount}`);
      });

    const sent: StateUpdate[] = [];
    const app = createApp({
      states: [Counter],
      sink: (_token, update) => {
        sent.push(update);
      },
    });

    await app.handleMessage({ token: 'c1', name: 'counter.add', payload: [2] });
    await app.shutdown();

    expect(sent).toEqual([
      { delta: { counter: { count: 2, double: 4 } }, events: [], processing: true },
      {
        delta: {},
        events: [{ name: '_console', payload: { message: 'added 2' } }],
        processing: false,
      },
    ]);
  });
});
