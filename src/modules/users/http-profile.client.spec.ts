import { RemoteError } from '../../common/errors/remote-error';
import { HttpProfileClient, toRemoteProfile } from './http-profile.client';
import type { RemoteProfile } from './profile-client';

const refreshedAt = new Date('2026-03-01T12:00:00.000Z');

function jsonResponse(body: unknown): Response {
  return new Response(JSON.stringify(body), { status: 200, headers: { 'content-type': 'application/json' } });
}

function makeClient(respond: () => Response) {
  const urls: string[] = [];
  const applied: Array<{ profiles: RemoteProfile[]; at: Date }> = [];
  const fetchImpl: typeof fetch = async (input) => {
    urls.push(String(input));
    return respond();
  };
  const client = new HttpProfileClient(
    { url: 'https://profiles.test/lookup.json', bearerToken: 'test-token', fetchImpl, now: () => refreshedAt },
    {
      applyProfiles: async (profiles, at) => {
        applied.push({ profiles: [...profiles], at });
        return profiles.length;
      },
    },
  );
  return { client, urls, applied };
}

describe('toRemoteProfile', () => {
  it('maps provider fields and normalizes blanks to null', () => {
    expect(
      toRemoteProfile({
        id_str: '1',
        screen_name: 'alice',
        name: 'Alice',
        profile_image_url_https: 'https://img.test/a.png',
        description: '',
        location: 'Louisville',
        followers_count: 10,
      }),
    ).toEqual({
      externalId: '1',
      screenName: 'alice',
      name: 'Alice',
      profileImageUrl: 'https://img.test/a.png',
      description: null,
      location: 'Louisville',
      followersCount: 10,
    });
  });

  it('falls back to the handle for a missing name and rejects records without ids', () => {
    expect(toRemoteProfile({ id_str: '2', screen_name: 'bob' })?.name).toBe('bob');
    expect(toRemoteProfile({ screen_name: 'nobody' })).toBeNull();
  });
});

describe('HttpProfileClient', () => {
  it('looks up the chunk and stores the decoded profiles', async () => {
    const { client, urls, applied } = makeClient(() =>
      jsonResponse([{ id_str: '1', screen_name: 'alice', name: 'Alice' }, { bogus: true }, { id_str: '2', screen_name: 'bob' }]),
    );

    await client.refreshUsers(['1', '2']);

    expect(urls).toEqual(['https://profiles.test/lookup.json?user_id=1%2C2']);
    expect(applied).toHaveLength(1);
    expect(applied[0]?.at).toBe(refreshedAt);
    expect(applied[0]?.profiles.map((p) => p.externalId)).toEqual(['1', '2']);
  });

  it('treats a 404 as no profiles found', async () => {
    const { client, applied } = makeClient(() => new Response('', { status: 404 }));
    await client.refreshUsers(['gone']);
    expect(applied).toEqual([{ profiles: [], at: refreshedAt }]);
  });

  it('raises a RemoteError for other failures without writing anything', async () => {
    const { client, applied } = makeClient(() => new Response('', { status: 503 }));
    const err: unknown = await client.refreshUsers(['1']).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(RemoteError);
    expect(err).toMatchObject({ service: 'profiles', status: 503 });
    expect(applied).toEqual([]);
  });

  it('skips the remote call for an empty chunk', async () => {
    const { client, urls } = makeClient(() => jsonResponse([]));
    await client.refreshUsers([]);
    expect(urls).toEqual([]);
  });
});
