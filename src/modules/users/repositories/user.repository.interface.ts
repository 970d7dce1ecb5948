/**
 * User Repository Interface
 *
 * Read access to the user table for the chat and contact services.
 * Records never carry the password hash.
 */

export const USER_REPOSITORY = Symbol('USER_REPOSITORY');

export interface UserRecord {
  id: string;
  username: string;
  phoneNumber: string;
  name: string;
  createdAt: Date;
}

export interface IUserRepository {
  findById(id: string): Promise<UserRecord | null>;

  /** Every registered user, ordered by username. */
  findAll(): Promise<UserRecord[]>;

  /**
   * One batch lookup. Ids with no user are simply absent from the result.
   */
  findByIds(ids: readonly string[]): Promise<UserRecord[]>;

  findByPhoneNumber(phoneNumber: string): Promise<UserRecord | null>;

  findByPhoneNumbers(phoneNumbers: readonly string[]): Promise<UserRecord[]>;

  /**
   * @throws ConflictError when another user already owns the number
   */
  updatePhoneNumber(userId: string, phoneNumber: string): Promise<void>;
}
