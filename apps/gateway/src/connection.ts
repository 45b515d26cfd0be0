import { parseClientFrame, replyFrame, type ClientFrame, type PushFrame, type ReplyFrame } from '@parley/proto';
import { ErrorCode, errorMessage, wsCloseCode, type SafeLogger, type WindowRateLimiter } from '@parley/shared';
import { TopicSession, type SessionDeps, type SessionPeer, type SessionUser } from './session';

export const CLOSE_PROTOCOL_VIOLATION = wsCloseCode(ErrorCode.VALIDATION);
export const CLOSE_RATE_LIMITED = wsCloseCode(ErrorCode.RATE_LIMITED);

/** The parts of a websocket a connection writes to. */
export interface Socket {
  send(data: string): void;
  close(code: number, reason: string): void;
}

export interface ConnectionDeps extends SessionDeps {
  rateLimiter: WindowRateLimiter;
}

/**
 * One authenticated socket. Frames are handled strictly one after another,
 * so a command never overtakes the join before it.
 */
export class Connection implements SessionPeer {
  private readonly sessions = new Map<string, TopicSession>();
  private queue: Promise<void> = Promise.resolve();
  private closed = false;
  private readonly logger: SafeLogger;

  constructor(
    readonly id: string,
    readonly user: SessionUser,
    private readonly socket: Socket,
    private readonly deps: ConnectionDeps,
  ) {
    this.logger = deps.logger.child({ connectionId: id, userId: user.summary.id });
  }

  /** Accepts one raw text frame from the socket. */
  receive(raw: string): void {
    if (this.closed) return;

    if (!this.deps.rateLimiter.consume(this.id)) {
      this.logger.warn({}, 'Rate limited, closing connection');
      this.shutdown(CLOSE_RATE_LIMITED, 'Rate limited');
      return;
    }

    this.queue = this.queue
      .then(() => this.process(raw))
      .catch((err: unknown) => {
        this.logger.error({ err: errorMessage(err) }, 'Frame handling failed');
      });
  }

  /** Settles once every frame received so far has been handled. */
  idle(): Promise<void> {
    return this.queue;
  }

  reply(frame: ReplyFrame): void {
    this.send(frame);
  }

  push(frame: PushFrame): void {
    this.send(frame);
  }

  /** The socket is gone: leave every topic. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.deps.rateLimiter.reset(this.id);

    for (const session of this.sessions.values()) {
      session.detach();
    }
    for (const { topic, diff } of this.deps.presence.untrackConnection(this.id)) {
      this.sessions.get(topic)?.announce(diff);
    }
    this.sessions.clear();
    this.logger.info({}, 'Connection closed');
  }

  private async process(raw: string): Promise<void> {
    if (this.closed) return;

    const frame = parseClientFrame(raw);
    if (!frame) {
      this.logger.warn({}, 'Invalid frame, closing connection');
      this.shutdown(CLOSE_PROTOCOL_VIOLATION, 'Protocol violation');
      return;
    }

    await this.handle(frame);
  }

  private async handle(frame: ClientFrame): Promise<void> {
    switch (frame.type) {
      case 'heartbeat':
        this.reply(replyFrame(frame.ref, null, 'ok'));
        return;

      case 'join': {
        if (this.sessions.has(frame.topic)) {
          this.reply(replyFrame(frame.ref, frame.topic, 'error', { reason: 'already_joined' }));
          return;
        }
        const session = new TopicSession(frame.topic, this, this.deps);
        this.sessions.set(frame.topic, session);
        const joined = await session.join(frame.ref);
        if (!joined) this.sessions.delete(frame.topic);
        return;
      }

      case 'leave': {
        const session = this.sessions.get(frame.topic);
        if (!session) {
          this.reply(replyFrame(frame.ref, frame.topic, 'error', { reason: 'not_joined' }));
          return;
        }
        this.sessions.delete(frame.topic);
        await session.leave(frame.ref);
        return;
      }

      case 'command': {
        const session = this.sessions.get(frame.topic);
        if (!session) {
          this.reply(replyFrame(frame.ref, frame.topic, 'error', { reason: 'not_joined' }));
          return;
        }
        await session.handleCommand(frame);
        return;
      }
    }
  }

  private shutdown(code: number, reason: string): void {
    this.socket.close(code, reason);
    this.close();
  }

  private send(frame: ReplyFrame | PushFrame): void {
    if (this.closed) return;
    this.socket.send(JSON.stringify(frame));
  }
}
