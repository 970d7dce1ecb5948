export interface ContactDisplay {
  id: string;
  contactUserId: string;
  displayName: string | null;
  contactUsername: string;
  contactPhoneNumber: string;
}

/** A registered user found by phone number. */
export interface ContactMatch {
  id: string;
  username: string;
  name: string;
  phoneNumber: string;
}

export type ContactUpdateType =
  | 'CONTACT_ADDED'
  | 'CONTACT_DETAILS_UPDATED'
  | 'CONTACT_REMOVED';

/** Sent to the other party; `userId`/`username` identify who acted. */
export interface ContactNotification {
  userId: string;
  username: string;
  updateType: ContactUpdateType;
}
