import { afterEach, describe, expect, it, vi } from 'vitest';
import { decodeFrame } from '../src/lib/frameCodec.js';
import { Hub, type HubOptions } from '../src/ws/hub.js';
import { FakeSocket, handshake } from './testUtils.js';

const options: HubOptions = {
  defaultRoom: 'home',
  heartbeatMs: 30_000,
  pongTimeoutMs: 60_000,
  sendTimeoutMs: 1_000,
  frameSendTimeoutMs: 50,
  maxFrameQueue: 2,
};

const cam1 = { device_id: 'cam1', room: 'home', width: 640, height: 480, fps: 15 };

function setup(overrides: Partial<HubOptions> = {}) {
  const hub = new Hub({ ...options, ...overrides });

  async function viewer(room?: string, socket = new FakeSocket({ autoPong: true })) {
    const session = hub.onViewerConnect(socket, { room });
    await session.idle();
    return { socket, session };
  }

  async function ingest(fields: Record<string, unknown> = cam1, socket = new FakeSocket(), room?: string) {
    const session = hub.onIngestConnect(socket, { room });
    socket.receive(handshake(fields));
    await session.idle();
    return { socket, session };
  }

  return { hub, viewer, ingest };
}

describe('Hub', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  describe('ingest handshake', () => {
    it('registers the stream without writing to the producer when the room is empty', async () => {
      const { hub, viewer, ingest } = setup();

      const producer = await ingest();
      expect(producer.session.state).toBe('streaming');
      expect(producer.socket.sent).toEqual([]);

      const late = await viewer('home');
      expect(late.socket.events()).toEqual([
        { type: 'manifest', streams: [{ ...cam1, last_seen: expect.any(Number) }] },
      ]);
      expect(hub.registry.ingestOf('cam1')).toBe(producer.session.peer);
    });

    it('announces a new stream to viewers already in the room', async () => {
      const { viewer, ingest } = setup();

      const early = await viewer('home');
      await ingest();

      expect(early.socket.events()).toEqual([
        { type: 'manifest', streams: [] },
        { type: 'join', stream: { ...cam1, last_seen: expect.any(Number) } },
      ]);
    });

    it('does not announce to viewers of other rooms', async () => {
      const { viewer, ingest } = setup();

      const elsewhere = await viewer('office');
      await ingest();

      expect(elsewhere.socket.events()).toEqual([{ type: 'manifest', streams: [] }]);
    });

    it('falls back to the query room and then the default room', async () => {
      const { hub, ingest } = setup();

      await ingest({ device_id: 'cam1' }, new FakeSocket(), 'garage');
      await ingest({ device_id: 'cam2', room: '   ' });
      await ingest({ device_id: 'cam3', room: ' porch ' }, new FakeSocket(), 'garage');

      expect(hub.registry.metaOf('cam1')).toEqual({
        device_id: 'cam1',
        room: 'garage',
        width: 0,
        height: 0,
        fps: 0,
        last_seen: expect.any(Number),
      });
      expect(hub.registry.metaOf('cam2')?.room).toBe('home');
      expect(hub.registry.metaOf('cam3')?.room).toBe('porch');
    });

    it.each([
      ['malformed JSON', '{"device_id":'],
      ['an empty device id', JSON.stringify({ device_id: '' })],
      ['a missing device id', JSON.stringify({ room: 'home' })],
      ['a non-integer size', JSON.stringify({ device_id: 'cam1', width: 'wide' })],
      ['a negative frame rate', JSON.stringify({ device_id: 'cam1', fps: -1 })],
    ])('closes the connection on %s without touching the registry', async (_label, message) => {
      const { hub, viewer } = setup();
      const watcher = await viewer('home');
      const socket = new FakeSocket();
      const session = hub.onIngestConnect(socket);

      socket.receive(message);
      await session.idle();

      expect(session.state).toBe('closed');
      expect(socket.closeCode).toBe(1008);
      expect(hub.registry.allMeta()).toEqual([]);
      expect(watcher.socket.events()).toEqual([{ type: 'manifest', streams: [] }]);
    });
  });

  describe('frame relay', () => {
    it('multiplexes each binary frame with the device id', async () => {
      const { viewer, ingest } = setup();
      const watcher = await viewer('home');
      const producer = await ingest();
      const payload = Buffer.alloc(1000, 0xab);

      producer.socket.receive(payload);
      await producer.session.idle();

      const [frame] = watcher.socket.frames();
      expect(frame.length).toBe(1006);
      expect(frame.readUInt16BE(0)).toBe(4);
      const decoded = decodeFrame(frame);
      expect(decoded.deviceId).toBe('cam1');
      expect(decoded.payload.equals(payload)).toBe(true);
    });

    it('sends 1005 bytes for a three byte device id', async () => {
      const { viewer, ingest } = setup();
      const watcher = await viewer('home');
      const producer = await ingest({ device_id: 'cam', room: 'home' });

      producer.socket.receive(Buffer.alloc(1000));
      await producer.session.idle();

      const [frame] = watcher.socket.frames();
      expect(frame.length).toBe(1005);
      expect(frame.readUInt16BE(0)).toBe(3);
    });

    it('ignores text messages after the handshake', async () => {
      const { viewer, ingest } = setup();
      const watcher = await viewer('home');
      const producer = await ingest();

      producer.socket.receive('{"hello":"again"}');
      await producer.session.idle();

      expect(producer.session.state).toBe('streaming');
      expect(watcher.socket.frames()).toEqual([]);
      expect(watcher.socket.events()).toHaveLength(2);
    });

    it('delivers frames to every viewer in the room', async () => {
      const { viewer, ingest } = setup();
      const first = await viewer('home');
      const second = await viewer('home');
      const other = await viewer('office');
      const producer = await ingest();

      producer.socket.receive(Buffer.from([1, 2, 3]));
      await producer.session.idle();

      expect(first.socket.frames()).toHaveLength(1);
      expect(second.socket.frames()).toHaveLength(1);
      expect(other.socket.frames()).toEqual([]);
    });

    it('keeps only the newest frames while a broadcast is pending', async () => {
      const { viewer, ingest } = setup({ maxFrameQueue: 2 });
      const watcher = await viewer('home');
      const producer = await ingest();
      for (let i = 1; i <= 5; i++) {
        producer.socket.receive(Buffer.from([i]));
      }
      await producer.session.idle();

      expect(watcher.socket.frames().map((frame) => decodeFrame(frame).payload[0])).toEqual([4, 5]);
    });

    it('delivers to healthy viewers and evicts the one that fails', async () => {
      const { hub, viewer, ingest } = setup();
      const healthy = await viewer('home');
      const failing = await viewer('home');
      const producer = await ingest();

      failing.socket.behaviour.failSends = true;
      const payload = Buffer.from('frame-data');
      producer.socket.receive(payload);
      await producer.session.idle();

      const [frame] = healthy.socket.frames();
      expect(decodeFrame(frame).payload.equals(payload)).toBe(true);
      expect(failing.socket.terminated).toBe(true);
      expect(failing.session.state).toBe('closed');
      expect(hub.registry.viewersOf('home').map((peer) => peer.id)).toEqual([healthy.session.peer.id]);
    });

    it('evicts a viewer whose send outlives the frame deadline', async () => {
      const { hub, viewer, ingest } = setup({ frameSendTimeoutMs: 20 });
      const healthy = await viewer('home');
      const stalled = await viewer('home');
      const producer = await ingest();

      stalled.socket.behaviour.stallSends = true;
      producer.socket.receive(Buffer.from('frame-data'));
      await producer.session.idle();

      expect(healthy.socket.frames()).toHaveLength(1);
      expect(stalled.socket.terminated).toBe(true);
      expect(hub.registry.viewersOf('home')).toHaveLength(1);
    });

    it('reports delivery counts from a direct broadcast', async () => {
      const { hub, viewer } = setup();
      await viewer('home');
      const failing = await viewer('home');
      failing.socket.behaviour.failSends = true;

      const result = await hub.broadcastFrame('home', Buffer.from([0, 1, 0x78, 9]));

      expect(result).toEqual({ delivered: 1, failed: 1 });
      expect(await hub.broadcastFrame('empty-room', Buffer.alloc(3))).toEqual({ delivered: 0, failed: 0 });
    });
  });

  describe('disconnects', () => {
    it('unregisters the stream and tells the room when a producer leaves', async () => {
      const { hub, viewer, ingest } = setup();
      const watcher = await viewer('home');
      const producer = await ingest();

      producer.socket.close(1000);
      await producer.session.idle();

      expect(producer.session.state).toBe('closed');
      expect(hub.registry.allMeta()).toEqual([]);
      expect(watcher.socket.events().at(-1)).toEqual({ type: 'leave', device_id: 'cam1' });
    });

    it('keeps exactly one producer per device on reconnect', async () => {
      const { hub, viewer, ingest } = setup();
      const watcher = await viewer('home');
      const first = await ingest();
      const second = await ingest();

      expect(first.socket.closeCode).toBe(4001);
      expect(first.session.state).toBe('closed');
      expect(hub.registry.ingestOf('cam1')).toBe(second.session.peer);
      expect(hub.registry.connections().ingest).toHaveLength(1);

      await first.session.idle();
      const joined = { type: 'join', stream: expect.objectContaining({ device_id: 'cam1' }) };
      expect(watcher.socket.events()).toEqual([{ type: 'manifest', streams: [] }, joined, joined]);

      second.socket.close(1000);
      await second.session.idle();
      expect(watcher.socket.events().at(-1)).toEqual({ type: 'leave', device_id: 'cam1' });
      expect(hub.registry.allMeta()).toEqual([]);
    });

    it('stops relaying a displaced producer while its close is still in progress', async () => {
      const { hub, viewer, ingest } = setup();
      const watcher = await viewer('home');
      const first = await ingest(cam1, new FakeSocket({ deferClose: true }));
      const second = await ingest();

      expect(first.socket.readyState).toBe(2);
      expect(first.socket.closeCode).toBe(4001);

      first.socket.receive(Buffer.from('stale'));
      await first.session.idle();
      second.socket.receive(Buffer.from('fresh'));
      await second.session.idle();

      expect(watcher.socket.frames().map((frame) => decodeFrame(frame).payload.toString())).toEqual(['fresh']);

      first.socket.finishClose();
      await first.session.idle();

      const joined = { type: 'join', stream: expect.objectContaining({ device_id: 'cam1' }) };
      expect(watcher.socket.events()).toEqual([{ type: 'manifest', streams: [] }, joined, joined]);
      expect(hub.registry.ingestOf('cam1')).toBe(second.session.peer);
    });

    it('drops a viewer from its room when it disconnects', async () => {
      const { hub, viewer } = setup();
      const watcher = await viewer('home');
      expect(watcher.session.state).toBe('idle');

      watcher.socket.receive('anything');
      watcher.socket.close(1001);

      expect(watcher.session.state).toBe('closed');
      expect(hub.registry.viewersOf('home')).toEqual([]);
      expect(hub.stats()).toEqual({ rooms: 0, viewers: 0, streams: 0 });
    });

    it('cleans up a silent producer once the pong deadline passes', async () => {
      vi.useFakeTimers();
      const { hub, viewer, ingest } = setup();
      const watcher = await viewer('home');
      const producer = await ingest();

      await vi.advanceTimersByTimeAsync(60_000);
      await producer.session.idle();

      expect(producer.socket.terminated).toBe(true);
      expect(producer.session.state).toBe('closed');
      expect(hub.registry.allMeta()).toEqual([]);
      expect(watcher.socket.terminated).toBe(false);
      expect(watcher.socket.events().at(-1)).toEqual({ type: 'leave', device_id: 'cam1' });
    });

    it('keeps a viewer that answers pings', async () => {
      vi.useFakeTimers();
      const { hub, viewer } = setup();
      const watcher = await viewer('home');

      await vi.advanceTimersByTimeAsync(180_000);

      expect(watcher.socket.pings).toBe(6);
      expect(watcher.session.state).toBe('idle');
      expect(hub.registry.viewersOf('home')).toHaveLength(1);
      watcher.socket.close(1000);
    });

    it('drops a viewer that stops answering pings', async () => {
      vi.useFakeTimers();
      const { hub, viewer } = setup();
      const watcher = await viewer('home', new FakeSocket());

      await vi.advanceTimersByTimeAsync(60_000);

      expect(watcher.socket.terminated).toBe(true);
      expect(watcher.session.state).toBe('closed');
      expect(hub.registry.viewersOf('home')).toEqual([]);
    });
  });

  describe('queries and shutdown', () => {
    it('lists every stream across rooms in the manifest', async () => {
      const { hub, ingest } = setup();
      await ingest();
      await ingest({ device_id: 'cam2', room: 'office', width: 1280, height: 720, fps: 30 });

      expect(hub.manifest()).toEqual({
        type: 'manifest',
        stream: [
          { ...cam1, last_seen: expect.any(Number) },
          { device_id: 'cam2', room: 'office', width: 1280, height: 720, fps: 30, last_seen: expect.any(Number) },
        ],
      });
    });

    it('closes every connection on shutdown', async () => {
      const { hub, viewer, ingest } = setup();
      const watcher = await viewer('home');
      const producer = await ingest();

      hub.shutdown();
      await producer.session.idle();

      expect(watcher.socket.closeCode).toBe(1001);
      expect(producer.socket.closeCode).toBe(1001);
      expect(hub.stats()).toEqual({ rooms: 0, viewers: 0, streams: 0 });
    });

    it('lets viewers finish their closing handshake when producers leave during shutdown', async () => {
      const { hub, viewer, ingest } = setup();
      const watcher = await viewer('home', new FakeSocket({ autoPong: true, deferClose: true }));
      const producer = await ingest(cam1, new FakeSocket({ deferClose: true }));

      hub.shutdown();
      producer.socket.finishClose();
      await producer.session.idle();

      expect(watcher.socket.closeCode).toBe(1001);
      expect(watcher.socket.terminated).toBe(false);
      expect(watcher.socket.events()).toEqual([
        { type: 'manifest', streams: [] },
        { type: 'join', stream: expect.objectContaining({ device_id: 'cam1' }) },
      ]);

      watcher.socket.finishClose();
      expect(watcher.session.state).toBe('closed');
      expect(hub.stats()).toEqual({ rooms: 0, viewers: 0, streams: 0 });
    });
  });
});
