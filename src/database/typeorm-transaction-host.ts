import { Injectable } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { ClsService, ClsStore } from 'nestjs-cls';
import { DataSource, EntityManager } from 'typeorm';
import { TransactionHost } from './transaction-host';

export interface TransactionClsStore extends ClsStore {
  txManager?: EntityManager;
}

/**
 * Runs work inside `DataSource.transaction` and carries the transactional
 * EntityManager through nestjs-cls, so repositories pick it up without
 * it being threaded through every call.
 */
@Injectable()
export class TypeOrmTransactionHost extends TransactionHost {
  constructor(
    @InjectDataSource() private readonly dataSource: DataSource,
    private readonly cls: ClsService<TransactionClsStore>,
  ) {
    super();
  }

  /**
   * The active transaction's manager, or the default one outside a
   * transaction.
   */
  get manager(): EntityManager {
    const active = this.cls.isActive() ? this.cls.get('txManager') : undefined;
    return active ?? this.dataSource.manager;
  }

  async run<T>(work: () => Promise<T>): Promise<T> {
    if (this.cls.isActive() && this.cls.get('txManager')) {
      return work();
    }

    return this.cls.run({ ifNested: 'inherit' }, () =>
      this.dataSource.transaction(async (manager) => {
        this.cls.set('txManager', manager);
        return work();
      }),
    );
  }
}
