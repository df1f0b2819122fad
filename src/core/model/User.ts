export interface UserRecord {
  id: number;
  isBot: boolean;
  firstName: string | null;
  lastName: string | null;
  handle: string | null;
  languageCode: string | null;
  isPremium: boolean;
}

export interface StoredUser extends UserRecord {
  firstSeenAt: Date;
  lastUpdatedAt: Date;
}

export const UNKNOWN_AUTHOR = 'Unknown';

/**
 * Name shown next to a user's messages: handle, then first name, then a placeholder.
 * Mirrors the `COALESCE(u.username, u.first_name, 'Unknown')` used in SQL.
 */
export function displayName(
  user: Pick<UserRecord, 'handle' | 'firstName'> | null | undefined,
): string {
  return user?.handle ?? user?.firstName ?? UNKNOWN_AUTHOR;
}
