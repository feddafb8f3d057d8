import type { StreamDescriptor, StreamMeta } from '../types.js';

export interface IngestRegistration<C> {
  /** The stored metadata, stamped with its registration time. */
  stream: StreamMeta;
  /** Producer that held the device id before this call, if any. The caller closes it. */
  previous?: C;
}

export interface RegistryStats {
  rooms: number;
  viewers: number;
  streams: number;
}

/**
 * Routing state for rooms, viewers and producers.
 *
 * Every method runs to completion without yielding, which makes each call a
 * critical section on the event loop. Nothing here performs I/O: callers take a
 * snapshot, leave, and only then write to sockets or close connections.
 */
export class ConnectionRegistry<C> {
  private readonly viewers = new Map<string, Set<C>>();
  private readonly viewerRooms = new Map<C, string>();
  private readonly ingest = new Map<string, C>();
  private readonly metas = new Map<string, StreamMeta>();

  constructor(private readonly now: () => number = Date.now) {}

  registerIngest(descriptor: StreamDescriptor, conn: C): IngestRegistration<C> {
    const deviceId = descriptor.device_id;
    const previous = this.ingest.get(deviceId);
    const stream: StreamMeta = { ...descriptor, last_seen: this.now() };

    this.ingest.set(deviceId, conn);
    this.metas.set(deviceId, stream);

    return {
      stream: { ...stream },
      previous: previous !== undefined && previous !== conn ? previous : undefined,
    };
  }

  /**
   * Drops the device's producer and metadata. With `conn`, only when `conn` is
   * still the registered producer, so a displaced connection cannot remove its
   * successor. Returns whether anything was removed.
   */
  unregisterIngest(deviceId: string, conn?: C): boolean {
    const current = this.ingest.get(deviceId);
    if (current === undefined) return false;
    if (conn !== undefined && current !== conn) return false;
    this.ingest.delete(deviceId);
    this.metas.delete(deviceId);
    return true;
  }

  /** Adds `conn` to `room` and returns the room's manifest at that instant. */
  registerViewer(room: string, conn: C): StreamMeta[] {
    const previousRoom = this.viewerRooms.get(conn);
    if (previousRoom !== undefined && previousRoom !== room) {
      this.removeViewer(previousRoom, conn);
    }

    let set = this.viewers.get(room);
    if (!set) {
      set = new Set();
      this.viewers.set(room, set);
    }
    set.add(conn);
    this.viewerRooms.set(conn, room);

    return this.streamsIn(room);
  }

  unregisterViewer(room: string, conn: C): boolean {
    return this.removeViewer(room, conn);
  }

  /** Removes the given viewers from `room`; returns the ones that were still registered. */
  evictViewers(room: string, conns: Iterable<C>): C[] {
    const removed: C[] = [];
    for (const conn of conns) {
      if (this.removeViewer(room, conn)) removed.push(conn);
    }
    return removed;
  }

  viewersOf(room: string): C[] {
    const set = this.viewers.get(room);
    return set ? Array.from(set) : [];
  }

  roomOf(conn: C): string | undefined {
    return this.viewerRooms.get(conn);
  }

  ingestOf(deviceId: string): C | undefined {
    return this.ingest.get(deviceId);
  }

  metaOf(deviceId: string): StreamMeta | undefined {
    const meta = this.metas.get(deviceId);
    return meta ? { ...meta } : undefined;
  }

  streamsIn(room: string): StreamMeta[] {
    const streams: StreamMeta[] = [];
    for (const meta of this.metas.values()) {
      if (meta.room === room) streams.push({ ...meta });
    }
    return streams;
  }

  allMeta(): StreamMeta[] {
    return Array.from(this.metas.values(), (meta) => ({ ...meta }));
  }

  connections(): { ingest: C[]; viewers: C[] } {
    return {
      ingest: Array.from(this.ingest.values()),
      viewers: Array.from(this.viewerRooms.keys()),
    };
  }

  stats(): RegistryStats {
    const rooms = new Set<string>(this.viewers.keys());
    for (const meta of this.metas.values()) rooms.add(meta.room);
    return {
      rooms: rooms.size,
      viewers: this.viewerRooms.size,
      streams: this.metas.size,
    };
  }

  private removeViewer(room: string, conn: C): boolean {
    const set = this.viewers.get(room);
    if (!set || !set.delete(conn)) return false;
    if (set.size === 0) this.viewers.delete(room);
    if (this.viewerRooms.get(conn) === room) this.viewerRooms.delete(conn);
    return true;
  }
}
