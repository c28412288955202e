import { StreamingResponder, StreamStateType } from '../../../src/patterns/state';
import { LookupError } from '../../../src/errors';
import { MemoryChannel, StubLookupClient } from '../../helpers/fakes';

describe('StreamingResponder', () => {
  describe('Completed streams', () => {
    test('should emit start, result and complete for a single candidate', async () => {
      const client = new StubLookupClient(domain => ({
        domain,
        domainSuffix: 'com',
        isRegistered: false,
        queryTime: '2026-01-12 10:00:30'
      }));
      const channel = new MemoryChannel();
      const responder = new StreamingResponder(client, channel);

      const outcome = await responder.run(['alpha.com']);

      expect(channel.events).toEqual([
        { type: 'start', total: 1 },
        {
          type: 'result',
          domain: 'alpha.com',
          domain_suffix: 'com',
          is_registered: false,
          query_time: '2026-01-12 10:00:30',
          completed: 1,
          total: 1
        },
        { type: 'complete', total: 1, completed: 1, unregistered: ['alpha.com'] }
      ]);
      expect(outcome).toEqual({ state: StreamStateType.COMPLETED, completed: 1, total: 1 });
      expect(responder.getState()).toBe(StreamStateType.COMPLETED);
    });

    test('should list only unregistered domains, in completion order', async () => {
      const client = new StubLookupClient(domain => ({
        domain,
        domainSuffix: 'com',
        isRegistered: domain.startsWith('taken')
      }));
      const channel = new MemoryChannel();

      await new StreamingResponder(client, channel).run(['free-a.com', 'taken.com', 'free-b.com']);

      expect(channel.events[channel.events.length - 1]).toEqual({
        type: 'complete',
        total: 3,
        completed: 3,
        unregistered: ['free-a.com', 'free-b.com']
      });
    });

    test('should count progress on every result event', async () => {
      const channel = new MemoryChannel();
      await new StreamingResponder(new StubLookupClient(), channel).run(['a.com', 'b.com']);

      const progress = channel.events.map(event =>
        event.type === 'result' ? `${event.domain} ${event.completed}/${event.total}` : event.type
      );
      expect(progress).toEqual(['start', 'a.com 1/2', 'b.com 2/2', 'complete']);
    });

    test('should record start -> running -> completed', async () => {
      const responder = new StreamingResponder(new StubLookupClient(), new MemoryChannel());
      await responder.run(['a.com']);

      expect(responder.getStateHistory().map(entry => [entry.from, entry.to])).toEqual([
        [StreamStateType.START, StreamStateType.RUNNING],
        [StreamStateType.RUNNING, StreamStateType.COMPLETED]
      ]);
    });
  });

  describe('Lookup failures', () => {
    test('should emit an error event and skip the remaining candidates', async () => {
      const client = new StubLookupClient(domain =>
        domain === 'b.com'
          ? new LookupError(domain, 'whois service returned an error for b.com: rate limit')
          : { domain, domainSuffix: 'com', isRegistered: true }
      );
      const channel = new MemoryChannel();
      const responder = new StreamingResponder(client, channel);

      const outcome = await responder.run(['a.com', 'b.com', 'c.com']);

      expect(channel.events.map(event => event.type)).toEqual(['start', 'result', 'error']);
      expect(channel.events[2]).toEqual({
        type: 'error',
        error: 'whois service returned an error for b.com: rate limit',
        completed: 1,
        total: 3
      });
      expect(client.domains).toEqual(['a.com', 'b.com']);
      expect(outcome).toEqual({
        state: StreamStateType.ABORTED,
        completed: 1,
        total: 3,
        reason: 'lookup-failed',
        detail: 'whois service returned an error for b.com: rate limit'
      });
    });
  });

  describe('Consumer disconnects', () => {
    test('should stop silently when a result cannot be written', async () => {
      const client = new StubLookupClient();
      const channel = new MemoryChannel(1);
      const responder = new StreamingResponder(client, channel);

      const outcome = await responder.run(['a.com', 'b.com', 'c.com']);

      expect(channel.events).toEqual([{ type: 'start', total: 3 }]);
      expect(client.domains).toEqual(['a.com']);
      expect(channel.attempts).toBe(2);
      expect(outcome.state).toBe(StreamStateType.ABORTED);
      expect(outcome.reason).toBe('disconnected');
      expect(outcome.completed).toBe(1);
    });

    test('should report an abort when the final event cannot be written', async () => {
      const client = new StubLookupClient();
      const channel = new MemoryChannel(3);
      const responder = new StreamingResponder(client, channel);

      const outcome = await responder.run(['a.com', 'b.com']);

      expect(channel.events.map(event => event.type)).toEqual(['start', 'result', 'result']);
      expect(client.domains).toEqual(['a.com', 'b.com']);
      expect(outcome).toEqual({
        state: StreamStateType.ABORTED,
        completed: 2,
        total: 2,
        reason: 'disconnected',
        detail: 'consumer disconnected'
      });
      expect(responder.getState()).toBe(StreamStateType.ABORTED);
    });

    test('should not look anything up when the start event fails', async () => {
      const client = new StubLookupClient();
      const responder = new StreamingResponder(client, new MemoryChannel(0));

      const outcome = await responder.run(['a.com']);

      expect(client.domains).toEqual([]);
      expect(outcome).toEqual({
        state: StreamStateType.ABORTED,
        completed: 0,
        total: 1,
        reason: 'disconnected',
        detail: 'consumer disconnected'
      });
      expect(responder.getStateHistory().map(entry => entry.to)).toEqual([StreamStateType.ABORTED]);
    });
  });

  test('should refuse to run twice', async () => {
    const responder = new StreamingResponder(new StubLookupClient(), new MemoryChannel());
    await responder.run([]);
    await expect(responder.run(['a.com'])).rejects.toThrow('Streaming responder already used (state: completed)');
  });
});
