export const PROFILE_CLIENT = Symbol('PROFILE_CLIENT');

/** Refreshes the cached profile fields of the given users (by provider id). */
export interface ProfileClient {
  refreshUsers(externalIds: readonly string[]): Promise<void>;
}

export type RemoteProfile = {
  externalId: string;
  screenName: string;
  name: string;
  profileImageUrl: string | null;
  description: string | null;
  location: string | null;
  followersCount: number | null;
};
