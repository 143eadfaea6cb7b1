import { PlaybackSession } from '../PlaybackSession';
import { TrackQueue } from '../TrackQueue';
import { FakeAudioOutput, flushPromises, makeEntry } from '../../__tests__/setup/fixtures';

describe('PlaybackSession', () => {
  let queue: TrackQueue;
  let output: FakeAudioOutput;
  let session: PlaybackSession;

  beforeEach(() => {
    queue = new TrackQueue();
    output = new FakeAudioOutput();
    session = new PlaybackSession('lounge', queue, output);
  });

  describe('play', () => {
    it('starts the head of the queue', async () => {
      const a = makeEntry('A');
      const b = makeEntry('B');
      queue.addAll([a, b]);

      await session.play();

      expect(output.started).toEqual([a]);
      expect(session.playingEntry).toBe(a);
      expect(session.status).toBe('playing');
      expect(session.isPlaying).toBe(true);
      expect(session.trackCount).toBe(2);
      expect(queue.lastTrack).toBe(a);
    });

    it('stays idle with an empty queue', async () => {
      await session.play();

      expect(output.started).toEqual([]);
      expect(session.status).toBe('idle');
    });

    it('skips entries the output refuses', async () => {
      const a = makeEntry('A');
      const b = makeEntry('B');
      queue.addAll([a, b]);
      output.refuse = (entry) => entry === a;

      await session.play();

      expect(output.started).toEqual([b]);
      expect(session.playingEntry).toBe(b);
      expect(queue.isEmpty()).toBe(true);
    });

    it('gives up once every entry has been refused', async () => {
      queue.addAll([makeEntry('A'), makeEntry('B')]);
      queue.repeatMode = 'SINGLE';
      output.refuse = () => true;

      await session.play();

      expect(session.status).toBe('idle');
      expect(queue.isEmpty()).toBe(true);
    });
  });

  describe('track end', () => {
    it('advances to the next entry', async () => {
      const a = makeEntry('A');
      const b = makeEntry('B');
      queue.addAll([a, b]);
      await session.play();

      output.finish(a);
      await flushPromises();

      expect(output.started).toEqual([a, b]);
      expect(session.playingEntry).toBe(b);
    });

    it('ignores the end of an entry that is no longer playing', async () => {
      const a = makeEntry('A');
      const b = makeEntry('B');
      queue.addAll([a, b]);
      await session.play();

      output.finish(b);
      await flushPromises();

      expect(output.started).toEqual([a]);
      expect(session.playingEntry).toBe(a);
    });

    it('goes idle after the last entry', async () => {
      const a = makeEntry('A');
      queue.add(a);
      await session.play();

      output.finish(a);
      await flushPromises();

      expect(session.status).toBe('idle');
      expect(queue.lastTrack).toBeNull();
    });

    it('replays the entry under SINGLE repeat', async () => {
      const a = makeEntry('A');
      queue.add(a);
      session.setRepeatMode('SINGLE');
      await session.play();

      output.finish(a);
      await flushPromises();

      expect(output.started).toHaveLength(2);
      expect(output.started[1]).not.toBe(a);
      expect(output.started[1].track).toBe(a.track);
    });
  });

  describe('pause and resume', () => {
    it('pauses and resumes the output', async () => {
      queue.add(makeEntry('A'));
      await session.play();

      expect(await session.pause()).toEqual({ success: true, value: undefined });
      expect(session.status).toBe('paused');
      expect(session.isPlaying).toBe(false);
      expect(await session.pause()).toEqual({ success: false, error: 'ALREADY_PAUSED' });

      expect(await session.resume()).toEqual({ success: true, value: undefined });
      expect(session.status).toBe('playing');
      expect(output.pauses).toBe(1);
      expect(output.resumes).toBe(1);
      expect(await session.resume()).toEqual({ success: false, error: 'NOT_PAUSED' });
    });

    it('refuses to pause when nothing is playing', async () => {
      expect(await session.pause()).toEqual({ success: false, error: 'NOTHING_PLAYING' });
    });
  });

  describe('skip', () => {
    it('stops the current entry and starts the next', async () => {
      const a = makeEntry('A');
      const b = makeEntry('B');
      queue.addAll([a, b]);
      await session.play();

      const result = await session.skip();

      expect(result).toEqual({ success: true, value: b });
      expect(output.stops).toBe(1);
      expect(output.started).toEqual([a, b]);
    });

    it('does not repeat a skipped entry', async () => {
      queue.add(makeEntry('A'));
      session.setRepeatMode('ALL');
      await session.play();

      const result = await session.skip();

      expect(result).toEqual({ success: true, value: null });
      expect(session.status).toBe('idle');
    });

    it('waits for play while paused', async () => {
      const a = makeEntry('A');
      const b = makeEntry('B');
      queue.addAll([a, b]);
      await session.play();
      await session.pause();

      expect(await session.skip()).toEqual({ success: true, value: null });
      expect(session.isPaused).toBe(true);

      await session.play();
      expect(session.playingEntry).toBe(b);
    });

    it('lets a play issued during a skip wait for it', async () => {
      const a = makeEntry('A');
      const b = makeEntry('B');
      const c = makeEntry('C');
      queue.addAll([a, b, c]);
      await session.play();

      const [skipped] = await Promise.all([session.skip(), session.play()]);

      expect(skipped).toEqual({ success: true, value: b });
      expect(output.started).toEqual([a, b]);
      expect(session.playingEntry).toBe(b);
      expect(queue.asList()).toEqual([c]);
    });

    it('ignores the end of the skipped entry', async () => {
      const a = makeEntry('A');
      const b = makeEntry('B');
      const c = makeEntry('C');
      queue.addAll([a, b, c]);
      await session.play();

      const skipping = session.skip();
      output.finish(a);
      await skipping;
      await flushPromises();

      expect(output.started).toEqual([a, b]);
      expect(session.playingEntry).toBe(b);
      expect(queue.asList()).toEqual([c]);
    });

    it('reports when there is nothing to skip', async () => {
      expect(await session.skip()).toEqual({ success: false, error: 'NOTHING_PLAYING' });
    });
  });

  it('stop clears the queue', async () => {
    queue.addAll([makeEntry('A'), makeEntry('B')]);
    await session.play();

    await session.stop();

    expect(queue.isEmpty()).toBe(true);
    expect(session.status).toBe('idle');
    expect(output.stops).toBe(1);
  });

  it('describes its state', async () => {
    const a = makeEntry('A', { durationMs: 60000 });
    queue.addAll([a, makeEntry('B', { durationMs: 90000 }), makeEntry('C', { isStream: true })]);
    session.setRepeatMode('ALL');
    await session.play();

    expect(session.getState()).toEqual({
      sessionId: 'lounge',
      status: 'playing',
      currentEntry: a,
      repeatMode: 'ALL',
      shuffle: false,
      queueSize: 2,
      queueDurationMs: 90000,
      streams: 1
    });
  });

  it('passes shuffle through to the queue', () => {
    session.setShuffle(true);

    expect(queue.isShuffle).toBe(true);
    expect(session.getState().shuffle).toBe(true);
  });

  it('detaches from the output on close', async () => {
    expect(output.listenerCount).toBe(1);

    await session.close();

    expect(output.listenerCount).toBe(0);
    expect(output.stops).toBe(1);
  });
});
