import { type MessageTarget, sameTarget } from './message';
import { type MessageRepository, type ReadReceipt, type ReadReceiptRepository, type WithTransaction } from './ports';

export interface ReadReceiptServiceDeps {
  messageRepo: MessageRepository;
  readReceiptRepo: ReadReceiptRepository;
  withTransaction: WithTransaction;
}

export class ReadReceiptService {
  constructor(private readonly deps: ReadReceiptServiceDeps) {}

  /** Records `messageId` as read. Receipts only move forward. */
  async markRead(target: MessageTarget, userId: string, messageId: string): Promise<ReadReceipt> {
    const { messageRepo, readReceiptRepo } = this.deps;

    return this.deps.withTransaction(async (tx) => {
      const message = await messageRepo.findById(tx, messageId);
      if (!message) {
        throw new ReadReceiptError('NOT_FOUND', 'Message not found');
      }
      if (!sameTarget(message.target, target)) {
        throw new ReadReceiptError('VALIDATION', 'Message does not belong to this channel or conversation');
      }
      return readReceiptRepo.advance(tx, { userId, target, lastReadMessageId: messageId });
    });
  }

  /** Messages after the receipt that the user did not write and that are not deleted. */
  async unreadCount(target: MessageTarget, userId: string): Promise<number> {
    const { messageRepo, readReceiptRepo } = this.deps;

    return this.deps.withTransaction(async (tx) => {
      const receipt = await readReceiptRepo.find(tx, userId, target);
      return messageRepo.countUnread(tx, target, {
        afterId: receipt?.lastReadMessageId ?? null,
        excludeAuthorId: userId,
      });
    });
  }
}

export class ReadReceiptError extends Error {
  constructor(
    public readonly kind: 'NOT_FOUND' | 'VALIDATION',
    message: string,
  ) {
    super(message);
    this.name = 'ReadReceiptError';
  }
}
