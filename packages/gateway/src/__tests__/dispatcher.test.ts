import { describe, it, expect, vi } from 'vitest';
import { z } from 'zod';
import { EntityStore } from '@relaycord/domain';
import { Dispatcher, defineHandler, type DroppedDispatch } from '../dispatcher';
import { createDefaultHandlers } from '../handlers';
import { PendingRequests } from '../pending-requests';

function createDispatcher(handlers = createDefaultHandlers()) {
  const store = new EntityStore();
  const pending = new PendingRequests();
  const drops: DroppedDispatch[] = [];
  const dispatcher = new Dispatcher({ store, pending, handlers, onDrop: (d) => drops.push(d) });
  return { store, pending, drops, dispatcher };
}

describe('Dispatcher', () => {
  it('drops an event whose sequence is lower than the last one seen', () => {
    const { store, drops, dispatcher } = createDispatcher();

    expect(dispatcher.dispatch('CHANNEL_CREATE', 5, { id: '10', type: 0, guild_id: '1', name: 'a' })).toBe(true);
    expect(dispatcher.dispatch('CHANNEL_UPDATE', 7, { id: '10', type: 0, name: 'b' })).toBe(true);
    expect(dispatcher.dispatch('CHANNEL_UPDATE', 6, { id: '10', type: 0, name: 'c' })).toBe(false);

    expect(store.get('channel', '10')?.name).toBe('b');
    expect(drops).toEqual([{ event: 'CHANNEL_UPDATE', sequence: 6, lastSequence: 7 }]);
    expect(dispatcher.sequence).toBe(7);
  });

  it('accepts any sequence again after a reset', () => {
    const { drops, dispatcher } = createDispatcher();
    dispatcher.dispatch('RESUMED', 9, null);
    dispatcher.reset();
    expect(dispatcher.dispatch('RESUMED', 1, null)).toBe(true);
    expect(drops).toEqual([]);
    expect(dispatcher.sequence).toBe(1);
  });

  it('ignores unknown events but still notifies listeners', () => {
    const { dispatcher } = createDispatcher();
    const listener = vi.fn();
    dispatcher.on('TYPING_START', listener);

    expect(dispatcher.dispatch('TYPING_START', 1, { channel_id: '10' })).toBe(true);
    expect(listener).toHaveBeenCalledWith({ channel_id: '10' }, 1);
  });

  it('runs the store handler, then settles pending requests, then calls listeners', async () => {
    const order: string[] = [];
    const handlers = {
      PING: defineHandler(z.object({ n: z.number() }), () => {
        order.push('handler');
      }),
    };
    const { pending, dispatcher } = createDispatcher(handlers);
    const waiting = pending.wait('PING', z.object({ n: z.number() }), () => true, 1000).then(() => {
      order.push('pending');
    });
    dispatcher.on('PING', () => order.push(`listener, ${pending.size} pending`));

    dispatcher.dispatch('PING', null, { n: 1 });
    await waiting;
    expect(order).toEqual(['handler', 'listener, 0 pending', 'pending']);
  });

  it('leaves the store alone when the payload does not validate', () => {
    const { store, dispatcher } = createDispatcher();
    dispatcher.dispatch('CHANNEL_CREATE', 1, { type: 0 });
    expect(store.size('channel')).toBe(0);
  });

  it('keeps dispatching when a listener throws', () => {
    const { dispatcher } = createDispatcher();
    const second = vi.fn();
    dispatcher.on('RESUMED', () => {
      throw new Error('boom');
    });
    dispatcher.on('RESUMED', second);

    expect(dispatcher.dispatch('RESUMED', 1, null)).toBe(true);
    expect(second).toHaveBeenCalledOnce();
  });

  it('stops calling a listener once unsubscribed', () => {
    const { dispatcher } = createDispatcher();
    const listener = vi.fn();
    const off = dispatcher.on('RESUMED', listener);
    off();
    dispatcher.dispatch('RESUMED', 1, null);
    expect(listener).not.toHaveBeenCalled();
  });
});
