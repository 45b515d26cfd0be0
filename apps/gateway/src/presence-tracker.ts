import { type PresenceDiff, type PresenceMeta, type PresenceState } from '@parley/proto';

export type PresenceMetaInput = Omit<PresenceMeta, 'userId' | 'onlineAt'>;

/** connectionId → meta; insertion order puts the most recently tracked last. */
type UserConnections = Map<string, PresenceMeta>;

/**
 * Who is on which topic, per connection. A user stays present on a topic
 * while any of their connections is tracked there.
 */
export class PresenceTracker {
  private readonly topics = new Map<string, Map<string, UserConnections>>();
  private readonly connections = new Map<string, Map<string, string>>();
  private running = false;

  constructor(private readonly now: () => Date = () => new Date()) {}

  start(): void {
    this.running = true;
  }

  stop(): void {
    this.running = false;
    this.topics.clear();
    this.connections.clear();
  }

  /** Records (or replaces) the meta of one connection on a topic. */
  track(topic: string, userId: string, connectionId: string, meta: PresenceMetaInput): PresenceDiff {
    if (!this.running) {
      throw new Error('Presence tracker is not running');
    }

    let users = this.topics.get(topic);
    if (!users) {
      users = new Map();
      this.topics.set(topic, users);
    }
    let conns = users.get(userId);
    if (!conns) {
      conns = new Map();
      users.set(userId, conns);
    }

    const entry: PresenceMeta = { ...meta, userId, onlineAt: this.now().toISOString() };
    conns.delete(connectionId);
    conns.set(connectionId, entry);

    let tracked = this.connections.get(connectionId);
    if (!tracked) {
      tracked = new Map();
      this.connections.set(connectionId, tracked);
    }
    tracked.set(topic, userId);

    return { joins: { [userId]: { metas: [entry] } }, leaves: {} };
  }

  untrack(topic: string, connectionId: string): PresenceDiff {
    const tracked = this.connections.get(connectionId);
    const userId = tracked?.get(topic);
    if (!tracked || userId === undefined) return emptyDiff();

    tracked.delete(topic);
    if (tracked.size === 0) this.connections.delete(connectionId);

    const users = this.topics.get(topic);
    const conns = users?.get(userId);
    const removed = conns?.get(connectionId);
    if (!users || !conns || !removed) return emptyDiff();

    conns.delete(connectionId);
    if (conns.size > 0) return emptyDiff();

    users.delete(userId);
    if (users.size === 0) this.topics.delete(topic);
    return { joins: {}, leaves: { [userId]: { metas: [removed] } } };
  }

  /** Drops a connection from every topic, returning the diff of each topic it left. */
  untrackConnection(connectionId: string): Array<{ topic: string; diff: PresenceDiff }> {
    const tracked = this.connections.get(connectionId);
    if (!tracked) return [];
    return [...tracked.keys()].map((topic) => ({ topic, diff: this.untrack(topic, connectionId) }));
  }

  /** One entry per present user, carrying the most recently tracked meta. */
  list(topic: string): PresenceState {
    const state: PresenceState = {};
    const users = this.topics.get(topic);
    if (!users) return state;
    for (const [userId, conns] of users) {
      const latest = [...conns.values()].pop();
      if (latest) state[userId] = { metas: [latest] };
    }
    return state;
  }
}

function emptyDiff(): PresenceDiff {
  return { joins: {}, leaves: {} };
}

export function isEmptyDiff(diff: PresenceDiff): boolean {
  return Object.keys(diff.joins).length === 0 && Object.keys(diff.leaves).length === 0;
}
