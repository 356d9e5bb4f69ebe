import { Logger } from '@nestjs/common';
import { z } from 'zod';
import { RemoteError } from '../../common/errors/remote-error';
import type { ProfileClient, RemoteProfile } from './profile-client';
import type { UsersRepository } from './users.repository';

export type HttpProfileClientOptions = {
  url: string;
  bearerToken: string;
  fetchImpl?: typeof fetch;
  now?: () => Date;
};

const remoteProfileSchema = z.object({
  id_str: z.string().min(1),
  screen_name: z.string().min(1),
  name: z.string().optional(),
  profile_image_url_https: z.string().nullish(),
  description: z.string().nullish(),
  location: z.string().nullish(),
  followers_count: z.number().int().nonnegative().nullish(),
});

export function toRemoteProfile(raw: unknown): RemoteProfile | null {
  const parsed = remoteProfileSchema.safeParse(raw);
  if (!parsed.success) return null;
  const p = parsed.data;
  return {
    externalId: p.id_str,
    screenName: p.screen_name,
    name: p.name?.trim() || p.screen_name,
    profileImageUrl: p.profile_image_url_https || null,
    description: p.description || null,
    location: p.location || null,
    followersCount: p.followers_count ?? null,
  };
}

export class HttpProfileClient implements ProfileClient {
  private readonly logger = new Logger(HttpProfileClient.name);
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => Date;

  constructor(
    private readonly options: HttpProfileClientOptions,
    private readonly users: Pick<UsersRepository, 'applyProfiles'>,
  ) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.now = options.now ?? (() => new Date());
  }

  async refreshUsers(externalIds: readonly string[]): Promise<void> {
    if (externalIds.length === 0) return;
    const profiles = await this.lookup(externalIds);
    const updated = await this.users.applyProfiles(profiles, this.now());
    this.logger.debug(`Profiles refreshed requested=${externalIds.length} received=${profiles.length} updated=${updated}`);
  }

  async lookup(externalIds: readonly string[]): Promise<RemoteProfile[]> {
    const url = new URL(this.options.url);
    url.searchParams.set('user_id', externalIds.join(','));

    const res = await this.fetchImpl(url.toString(), {
      headers: { Authorization: `Bearer ${this.options.bearerToken}` },
    }).catch((err: unknown) => {
      throw new RemoteError('profiles', `Profile lookup failed: ${err instanceof Error ? err.message : String(err)}`, null, {
        cause: err,
      });
    });
    // The lookup endpoint answers 404 when none of the ids exist anymore.
    if (res.status === 404) return [];
    if (!res.ok) throw new RemoteError('profiles', `Profile lookup failed: HTTP ${res.status}`, res.status);

    const body: unknown = await res.json().catch((err: unknown) => {
      throw new RemoteError('profiles', 'Profile lookup returned invalid JSON', res.status, { cause: err });
    });
    if (!Array.isArray(body)) throw new RemoteError('profiles', 'Profile lookup returned a non-array body', res.status);

    const profiles: RemoteProfile[] = [];
    for (const item of body) {
      const profile = toRemoteProfile(item);
      if (profile) profiles.push(profile);
      else this.logger.warn('Skipping undecodable profile in lookup response');
    }
    return profiles;
  }
}
