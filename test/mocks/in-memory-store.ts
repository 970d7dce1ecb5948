import { AsyncLocalStorage } from 'node:async_hooks';
import { ClsService, ClsStore } from 'nestjs-cls';
import type { UserRecord } from '../../src/modules/users/repositories';
import type {
  ChatRecord,
  MemberRecord,
} from '../../src/modules/chat/repositories';
import type { MessageRecord } from '../../src/modules/message/repositories';
import type { ContactRecord } from '../../src/modules/contact/repositories';

export interface StoreState {
  users: UserRecord[];
  chats: ChatRecord[];
  members: MemberRecord[];
  messages: MessageRecord[];
  contacts: ContactRecord[];
}

/**
 * One open in-memory transaction: undo steps for its writes, and release
 * callbacks for the row locks it holds until commit or rollback.
 */
export interface InMemoryTransaction {
  undo: Array<() => void>;
  locks: Map<string, () => void>;
}

interface InMemoryTxStore extends ClsStore {
  transaction?: InMemoryTransaction;
}

const BASE_TIME = Date.parse('2025-01-01T00:00:00.000Z');

/**
 * Table rows shared by the in-memory repositories. Timestamps come from a
 * clock that advances one second per call, so ordering is deterministic.
 *
 * The active transaction follows the async call chain (nestjs-cls), so
 * concurrent operations each get their own undo log and locks.
 */
export class InMemoryStore {
  state: StoreState = {
    users: [],
    chats: [],
    members: [],
    messages: [],
    contacts: [],
  };

  readonly cls = new ClsService<InMemoryTxStore>(new AsyncLocalStorage());

  private readonly lockTails = new Map<string, Promise<void>>();
  private nextId = 1;
  private nextSeq = 1;
  private ticks = 0;

  newId(prefix: string): string {
    return `${prefix}-${this.nextId++}`;
  }

  newSeq(): number {
    return this.nextSeq++;
  }

  now(): Date {
    return new Date(BASE_TIME + 1000 * this.ticks++);
  }

  transaction(): InMemoryTransaction | undefined {
    return this.cls.isActive() ? this.cls.get('transaction') : undefined;
  }

  /** Registers how to revert a write if the active transaction rolls back. */
  onRollback(undo: () => void): void {
    this.transaction()?.undo.push(undo);
  }

  /**
   * Row lock held until the active transaction ends (SELECT ... FOR
   * UPDATE). Outside a transaction it is released at once.
   */
  async lockRow(key: string): Promise<void> {
    const transaction = this.transaction();
    if (!transaction || transaction.locks.has(key)) return;

    const previous = this.lockTails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const held = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => held);
    this.lockTails.set(key, tail);
    transaction.locks.set(key, () => {
      release();
      if (this.lockTails.get(key) === tail) this.lockTails.delete(key);
    });

    await previous;
  }

  addUser(username: string, phoneNumber: string, name = username): UserRecord {
    const user: UserRecord = {
      id: this.newId('user'),
      username,
      phoneNumber,
      name,
      createdAt: this.now(),
    };
    this.state.users.push(user);
    return { ...user };
  }

  findUser(userId: string): UserRecord | undefined {
    const user = this.state.users.find((candidate) => candidate.id === userId);
    return user ? { ...user } : undefined;
  }
}
