/**
 * Persisted enum values. Each maps to a Postgres enum type (chat_type,
 * member_role, message_type); the string value is also the wire form.
 */

export enum ChatType {
  P2P = 'P2P',
  GROUP = 'GROUP',
}

export enum MemberRole {
  ADMIN = 'ADMIN',
  MEMBER = 'MEMBER',
}

export enum MessageType {
  TEXT = 'TEXT',
  IMAGE = 'IMAGE',
  VIDEO = 'VIDEO',
  VOICE = 'VOICE',
  AUDIO = 'AUDIO',
}

/**
 * Case-insensitive lookup of an enum member by its string value.
 * Returns undefined for anything that is not a member.
 */
export function parseEnumValue<T extends string>(
  values: Record<string, T>,
  raw: string | null | undefined,
): T | undefined {
  if (!raw) return undefined;
  const normalized = raw.trim().toUpperCase();
  return Object.values(values).find((value) => value === normalized);
}
