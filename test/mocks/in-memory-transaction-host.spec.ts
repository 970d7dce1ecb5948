import { describe, it, expect, beforeEach } from 'vitest';
import { ChatType } from '../../src/common/enums/chat.enums';
import { InMemoryChatRepository } from './in-memory-repositories';
import { InMemoryStore } from './in-memory-store';
import { InMemoryTransactionHost } from './in-memory-transaction-host';

function gate(): { opened: Promise<void>; open: () => void } {
  let open: () => void = () => undefined;
  const opened = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { opened, open };
}

const tick = () => new Promise((resolve) => setTimeout(resolve, 5));

describe('InMemoryTransactionHost', () => {
  let store: InMemoryStore;
  let journal: string[];
  let host: InMemoryTransactionHost;
  let chats: InMemoryChatRepository;

  beforeEach(() => {
    store = new InMemoryStore();
    journal = [];
    host = new InMemoryTransactionHost(store, journal);
    chats = new InMemoryChatRepository(store);
  });

  const createGroup = (groupName: string) =>
    chats.createChat({ type: ChatType.GROUP, groupName, groupImage: null });

  it('should give concurrent runs separate transactions', async () => {
    const seen = await Promise.all([
      host.run(async () => {
        await tick();
        return store.transaction();
      }),
      host.run(async () => store.transaction()),
    ]);

    expect(seen[0]).toBeDefined();
    expect(seen[1]).toBeDefined();
    expect(seen[0]).not.toBe(seen[1]);
    expect(store.transaction()).toBeUndefined();
  });

  it('should join the outer transaction on a nested run', async () => {
    await expect(
      host.run(async () => {
        await createGroup('outer');
        await host.run(async () => {
          await createGroup('inner');
        });
        throw new Error('outer failed');
      }),
    ).rejects.toThrow('outer failed');

    expect(store.state.chats).toEqual([]);
    expect(journal).toEqual([]);
  });

  it('should roll back only the failing transaction', async () => {
    const firstMayFail = gate();

    const [failed, committed] = await Promise.allSettled([
      host.run(async () => {
        await createGroup('first');
        await firstMayFail.opened;
        throw new Error('first failed');
      }),
      host.run(async () => {
        const chat = await createGroup('second');
        firstMayFail.open();
        return chat;
      }),
    ]);

    expect(failed.status).toBe('rejected');
    expect(committed.status).toBe('fulfilled');
    expect(store.state.chats.map((chat) => chat.groupName)).toEqual(['second']);
    expect(journal).toEqual(['commit']);
  });

  it('should hold a row lock until the holder commits', async () => {
    const order: string[] = [];
    const firstMayFinish = gate();

    const first = host.run(async () => {
      await store.lockRow('chat:chat-1');
      order.push('first locked');
      await firstMayFinish.opened;
      order.push('first done');
    });
    const second = host.run(async () => {
      await store.lockRow('chat:chat-1');
      order.push('second locked');
    });

    await tick();
    expect(order).toEqual(['first locked']);

    firstMayFinish.open();
    await Promise.all([first, second]);

    expect(order).toEqual(['first locked', 'first done', 'second locked']);
  });

  it('should release row locks on rollback', async () => {
    const failed = host.run(async () => {
      await store.lockRow('chat:chat-1');
      throw new Error('holder failed');
    });
    const waiting = host.run(async () => {
      await store.lockRow('chat:chat-1');
      return 'acquired';
    });

    await expect(failed).rejects.toThrow('holder failed');
    await expect(waiting).resolves.toBe('acquired');
  });

  it('should not wait for a lock outside a transaction', async () => {
    await expect(store.lockRow('chat:chat-1')).resolves.toBeUndefined();
  });
});
