import { describe, it, expect, jest } from '@jest/globals';
import type { Request, Response } from 'express';
import { createSigningKey, jwtSign } from '../tokens.js';
import { getSubject, requireSubject, resolveSubject } from './subject.js';
import { UnauthorizedError } from './errors.js';
import { encodeCallbackState } from './callback-state.js';

const key = createSigningKey('test-secret-for-subjects');

function createMockResponse() {
  const res = {
    status: jest.fn<(code: number) => unknown>(),
    json: jest.fn<(body: unknown) => unknown>(),
  };
  res.status.mockReturnValue(res);
  res.json.mockReturnValue(res);
  return res;
}

describe('resolveSubject', () => {
  it('reads the user id and preferred user name', async () => {
    const token = await jwtSign({ sub: 'user-1', preferred_username: 'alice', name: 'Alice A.' }, key);

    expect(await resolveSubject(`Bearer ${token}`, key)).toEqual({ userId: 'user-1', userName: 'alice', token });
  });

  it('falls back to the name claim and then to the user id', async () => {
    const named = await jwtSign({ sub: 'user-1', name: 'Alice A.' }, key);
    const bare = await jwtSign({ sub: 'user-2' }, key);

    expect((await resolveSubject(`Bearer ${named}`, key)).userName).toBe('Alice A.');
    expect((await resolveSubject(`bearer ${bare}`, key)).userName).toBe('user-2');
  });

  it('rejects a missing header or another scheme', async () => {
    await expect(resolveSubject(undefined, key)).rejects.toThrow(new UnauthorizedError('Missing bearer token'));
    await expect(resolveSubject('Basic dXNlcjpwYXNz', key)).rejects.toThrow('Missing bearer token');
  });

  it('rejects tokens signed with another key', async () => {
    const token = await jwtSign({ sub: 'user-1' }, createSigningKey('another-test-secret'));

    await expect(resolveSubject(`Bearer ${token}`, key)).rejects.toThrow(new UnauthorizedError('Invalid bearer token'));
  });

  it('rejects expired tokens', async () => {
    const token = await jwtSign({ sub: 'user-1', exp: Math.floor(Date.now() / 1000) - 60 }, key);

    await expect(resolveSubject(`Bearer ${token}`, key)).rejects.toThrow('Invalid bearer token');
  });

  it('rejects a callback state signed with the same key', async () => {
    const state = await encodeCallbackState(
      { flowId: 'flow-1', providerName: 'github', scopes: ['repo'], userId: 'user-1', userName: 'alice' },
      key,
      '15m'
    );

    await expect(resolveSubject(`Bearer ${state}`, key)).rejects.toThrow(new UnauthorizedError('Invalid bearer token'));
  });

  it('rejects tokens without a subject', async () => {
    const token = await jwtSign({ name: 'nobody' }, key);

    await expect(resolveSubject(`Bearer ${token}`, key)).rejects.toThrow('Bearer token has no subject');
  });
});

describe('requireSubject', () => {
  it('attaches the subject to the request and continues', async () => {
    const token = await jwtSign({ sub: 'user-1', preferred_username: 'alice' }, key);
    const req = { headers: { authorization: `Bearer ${token}` } } as unknown as Request;
    const res = createMockResponse();
    const next = jest.fn();

    await requireSubject(key)(req, res as unknown as Response, next);

    expect(next).toHaveBeenCalledTimes(1);
    expect(res.status).not.toHaveBeenCalled();
    expect(getSubject(req)).toEqual({ userId: 'user-1', userName: 'alice', token });
  });

  it('answers 401 without calling the handler', async () => {
    const req = { headers: {} } as unknown as Request;
    const res = createMockResponse();
    const next = jest.fn();

    await requireSubject(key)(req, res as unknown as Response, next);

    expect(next).not.toHaveBeenCalled();
    expect(res.status).toHaveBeenCalledWith(401);
    expect(res.json).toHaveBeenCalledWith({ success: false, error: 'Missing bearer token' });
    expect(() => getSubject(req)).toThrow('Request has no authenticated subject');
  });
});
