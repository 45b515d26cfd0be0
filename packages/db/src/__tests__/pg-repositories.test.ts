import { describe, it, expect, vi } from 'vitest';
import { clientOf } from '../client';
import { PgMessageRepository } from '../repositories/message-repository';
import { PgReadReceiptRepository } from '../repositories/read-receipt-repository';
import { PgConversationRepository } from '../repositories/conversation-repository';
import { PgMembershipRepository } from '../repositories/membership-repository';
import { PgChannelRepository } from '../repositories/channel-repository';
import { PgUserRepository } from '../repositories/user-repository';

const CREATED = new Date('2026-02-01T00:00:00Z');

function fakeClient(rows: Record<string, unknown>[], rowCount: number = rows.length) {
  return {
    query: vi.fn(async (_sql: string, _params?: unknown[]) => ({ rows, rowCount })),
    release: vi.fn(),
  };
}

function messageRow(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: '700',
    channel_id: '500',
    direct_conversation_id: null,
    user_id: '100',
    message_type: 'text',
    content: 'hello',
    parent_message_id: null,
    edited_at: null,
    is_deleted: false,
    metadata: {},
    attachments: [],
    created_at: CREATED,
    updated_at: CREATED,
    ...overrides,
  };
}

describe('clientOf', () => {
  it('rejects handles that are not pg clients', () => {
    expect(() => clientOf({})).toThrow('Expected a pg client as transaction handle');
  });
});

describe('PgMessageRepository', () => {
  const repo = new PgMessageRepository();

  it('maps a channel row to a user message', async () => {
    const client = fakeClient([messageRow()]);

    const message = await repo.findById(client, '700');

    expect(message).toMatchObject({
      kind: 'user',
      type: 'text',
      authorId: '100',
      target: { kind: 'channel', channelId: '500' },
    });
  });

  it('maps an authorless row to a system message', async () => {
    const client = fakeClient([
      messageRow({ channel_id: null, direct_conversation_id: '900', user_id: null, message_type: 'system' }),
    ]);

    const message = await repo.findById(client, '700');

    expect(message).toMatchObject({
      kind: 'system',
      type: 'system',
      authorId: null,
      target: { kind: 'conversation', conversationId: '900' },
    });
  });

  it('refuses unknown message types', async () => {
    const client = fakeClient([messageRow({ message_type: 'poll' })]);

    await expect(repo.findById(client, '700')).rejects.toThrow('Unknown message type: poll');
  });

  it('pages by id below the cursor', async () => {
    const client = fakeClient([]);

    await repo.listByTarget(client, { kind: 'conversation', conversationId: '900' }, { beforeId: '750', limit: 26 });

    const [sql, params] = client.query.mock.calls[0];
    expect(sql).toContain('direct_conversation_id = $1');
    expect(sql).toContain('id < $2');
    expect(params).toEqual(['900', '750', 26]);
  });

  it('searches readable targets with literal wildcards and numbered filters', async () => {
    const client = fakeClient([messageRow({ content: '50%_off today' })]);

    const found = await repo.search(client, {
      viewerId: '100',
      query: '50%_off',
      target: { kind: 'channel', channelId: '500' },
      authorId: '200',
      beforeId: '900',
      limit: 26,
    });

    const [sql, params] = client.query.mock.calls[0];
    expect(params).toEqual(['%50\\%\\_off%', '100', '500', '200', '900', 26]);
    expect(sql).toContain('m.content ILIKE $1');
    expect(sql).toContain('cm.user_id = $2');
    expect(sql).toContain('m.channel_id = $3 AND m.user_id = $4 AND m.id < $5');
    expect(sql).toContain('LIMIT $6');
    expect(found).toHaveLength(1);
  });

  it('returns an empty map without querying for no parents', async () => {
    const client = fakeClient([]);

    const counts = await repo.countReplies(client, []);

    expect(counts.size).toBe(0);
    expect(client.query).not.toHaveBeenCalled();
  });
});

describe('PgReadReceiptRepository', () => {
  it('upserts against the conversation index with GREATEST', async () => {
    const client = fakeClient([
      {
        user_id: '100',
        channel_id: null,
        direct_conversation_id: '900',
        last_read_message_id: '710',
        updated_at: CREATED,
      },
    ]);

    const receipt = await new PgReadReceiptRepository().advance(client, {
      userId: '100',
      target: { kind: 'conversation', conversationId: '900' },
      lastReadMessageId: '705',
    });

    const [sql, params] = client.query.mock.calls[0];
    expect(sql).toContain('(user_id, direct_conversation_id) WHERE direct_conversation_id IS NOT NULL');
    expect(sql).toContain('GREATEST');
    expect(params).toEqual(['100', null, '900', '705']);
    expect(receipt.lastReadMessageId).toBe('710');
  });
});

describe('PgConversationRepository', () => {
  it('archives the column of the given side', async () => {
    const client = fakeClient([]);

    const result = await new PgConversationRepository().setArchived(client, '900', 'user2', true);

    expect(result).toBeNull();
    expect(client.query.mock.calls[0][0]).toContain('SET is_archived_by_user2 = $2');
  });
});

describe('PgMembershipRepository', () => {
  it('reports a conflicting insert as null', async () => {
    const client = fakeClient([], 0);

    const added = await new PgMembershipRepository().add(client, {
      channelId: '500',
      userId: '100',
      role: 'member',
    });

    expect(added).toBeNull();
  });

  it('refuses unknown roles', async () => {
    const client = fakeClient([{ channel_id: '500', user_id: '100', role: 'guest', joined_at: CREATED }]);

    await expect(new PgMembershipRepository().find(client, '500', '100')).rejects.toThrow(
      'Unknown member role: guest',
    );
  });
});

describe('PgChannelRepository', () => {
  it('updates only the sent fields and guards the new name', async () => {
    const client = fakeClient([]);

    const updated = await new PgChannelRepository().update(client, '500', { name: 'random', topic: null });

    const [sql, params] = client.query.mock.calls[0];
    expect(params).toEqual(['500', 'random', null]);
    expect(sql).toContain('SET name = $2, topic = $3, updated_at = NOW()');
    expect(sql).toContain('o.name = $2 AND o.id <> c.id');
    expect(updated).toBeNull();
  });
});

describe('PgUserRepository', () => {
  it('matches username or email with one escaped pattern', async () => {
    const client = fakeClient([]);

    await new PgUserRepository().search(client, 'a_b', 10);

    const [sql, params] = client.query.mock.calls[0];
    expect(sql).toContain('username ILIKE $1 OR email ILIKE $1');
    expect(params).toEqual(['%a\\_b%', 10]);
  });
});
