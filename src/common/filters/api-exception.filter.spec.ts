import { NotFoundException } from '@nestjs/common';
import { z } from 'zod';
import { RemoteError } from '../errors/remote-error';
import { toErrorEnvelope } from './api-exception.filter';

describe('toErrorEnvelope', () => {
  it('maps validation errors to 400 with the failing path', () => {
    const parsed = z.object({ postIds: z.array(z.string()).min(1) }).safeParse({ postIds: [] });
    if (parsed.success) throw new Error('expected a validation failure');

    expect(toErrorEnvelope(parsed.error, 'req-1')).toEqual({
      meta: {
        status: 400,
        requestId: 'req-1',
        errors: [{ code: 400, message: 'Array must contain at least 1 element(s)', reason: 'postIds' }],
      },
    });
  });

  it('keeps the status and message of HTTP exceptions', () => {
    expect(toErrorEnvelope(new NotFoundException('Vision not found.'), null)).toEqual({
      meta: { status: 404, errors: [{ code: 404, message: 'Vision not found.', reason: 'Not Found' }] },
    });
  });

  it('maps remote failures to 502', () => {
    const env = toErrorEnvelope(new RemoteError('profiles', 'Profile lookup failed: HTTP 503', 503), null);
    expect(env.meta).toEqual({
      status: 502,
      errors: [{ code: 502, message: 'Profile lookup failed: HTTP 503', reason: 'remote_profiles' }],
    });
  });

  it('hides unknown errors behind a generic 500', () => {
    expect(toErrorEnvelope(new Error('boom'), null).meta.errors).toEqual([
      { code: 500, message: 'Internal server error', reason: 'internal_error' },
    ]);
  });
});
