/**
 * Contact Repository Interface
 */

import type { UserRecord } from '../../users/repositories';

export const CONTACT_REPOSITORY = Symbol('CONTACT_REPOSITORY');

export interface ContactRecord {
  id: string;
  ownerId: string;
  contactUserId: string;
  displayName: string | null;
}

export interface ContactWithUser extends ContactRecord {
  contactUser: UserRecord;
}

export interface NewContact {
  ownerId: string;
  contactUserId: string;
  displayName: string | null;
}

export interface IContactRepository {
  /** Owner's contacts with the contact user attached. */
  findByOwner(ownerId: string): Promise<ContactWithUser[]>;

  findByOwnerAndContactUser(
    ownerId: string,
    contactUserId: string,
  ): Promise<ContactWithUser | null>;

  /** Every owner that holds `contactUserId` as a contact. */
  findOwnerIdsByContactUser(contactUserId: string): Promise<string[]>;

  /**
   * @throws ValidationError when the (owner, contact user) pair exists
   */
  create(contact: NewContact): Promise<ContactRecord>;

  updateDisplayName(contactId: string, displayName: string): Promise<void>;

  delete(contactId: string): Promise<void>;
}
