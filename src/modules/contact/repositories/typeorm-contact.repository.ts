/**
 * TypeORM implementation of Contact Repository
 */

import { Injectable } from '@nestjs/common';
import { ValidationError } from '../../../common/errors/chat-domain.errors';
import { isUniqueViolation } from '../../../database/query-errors';
import { TypeOrmTransactionHost } from '../../../database/typeorm-transaction-host';
import { toUserRecord } from '../../users/repositories/typeorm-user.repository';
import { Contact } from '../entities/contact.entity';
import type {
  ContactRecord,
  ContactWithUser,
  IContactRepository,
  NewContact,
} from './contact.repository.interface';

function toContactRecord(contact: Contact): ContactRecord {
  return {
    id: contact.id,
    ownerId: contact.ownerId,
    contactUserId: contact.contactUserId,
    displayName: contact.displayName,
  };
}

function toContactWithUser(contact: Contact): ContactWithUser {
  if (!contact.contactUser) {
    throw new Error(`Contact ${contact.id} loaded without its user`);
  }
  return {
    ...toContactRecord(contact),
    contactUser: toUserRecord(contact.contactUser),
  };
}

@Injectable()
export class TypeOrmContactRepository implements IContactRepository {
  constructor(private readonly txHost: TypeOrmTransactionHost) {}

  private get repo() {
    return this.txHost.manager.getRepository(Contact);
  }

  async findByOwner(ownerId: string): Promise<ContactWithUser[]> {
    const contacts = await this.repo.find({
      where: { ownerId },
      relations: { contactUser: true },
      order: { contactUser: { username: 'ASC' } },
    });
    return contacts.map(toContactWithUser);
  }

  async findByOwnerAndContactUser(
    ownerId: string,
    contactUserId: string,
  ): Promise<ContactWithUser | null> {
    const contact = await this.repo.findOne({
      where: { ownerId, contactUserId },
      relations: { contactUser: true },
    });
    return contact ? toContactWithUser(contact) : null;
  }

  async findOwnerIdsByContactUser(contactUserId: string): Promise<string[]> {
    const contacts = await this.repo.find({
      select: { ownerId: true },
      where: { contactUserId },
    });
    return contacts.map((contact) => contact.ownerId);
  }

  async create(contact: NewContact): Promise<ContactRecord> {
    try {
      const saved = await this.repo.save(this.repo.create(contact));
      return toContactRecord(saved);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ValidationError('Contact already added');
      }
      throw error;
    }
  }

  async updateDisplayName(contactId: string, displayName: string): Promise<void> {
    await this.repo.update({ id: contactId }, { displayName });
  }

  async delete(contactId: string): Promise<void> {
    await this.repo.delete({ id: contactId });
  }
}
