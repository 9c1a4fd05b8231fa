import { describe, it, expect, vi, beforeEach } from 'vitest';

const get = vi.hoisted(() => vi.fn());
vi.mock('axios', () => ({ default: { get } }));

import { httpGet } from '../../src/util/http.js';
import { FetchError } from '../../src/errors/index.js';

describe('http', () => {
  beforeEach(() => {
    get.mockReset();
  });

  describe('httpGet', () => {
    it('should return status and data', async () => {
      get.mockResolvedValue({ status: 200, data: [{ Status: 'Final' }] });

      const res = await httpGet<unknown[]>('https://api.example.com/games', { Accept: 'application/json' });

      expect(res).toEqual({ status: 200, data: [{ Status: 'Final' }] });
      expect(get).toHaveBeenCalledWith('https://api.example.com/games', {
        headers: { Accept: 'application/json' },
        validateStatus: expect.any(Function),
      });
    });

    it('should not throw on HTTP error statuses', async () => {
      get.mockResolvedValue({ status: 503, data: 'unavailable' });

      const res = await httpGet('https://api.example.com/games');

      expect(res.status).toBe(503);
    });

    it('should throw FetchError with the log URL on network failure', async () => {
      get.mockRejectedValue(new Error('getaddrinfo ENOTFOUND api.example.com'));

      const failure = httpGet('https://api.example.com/games?key=test-secret', {}, 'https://api.example.com/games?key=***');

      await expect(failure).rejects.toBeInstanceOf(FetchError);
      await expect(failure).rejects.toMatchObject({
        message: 'HTTP request failed: getaddrinfo ENOTFOUND api.example.com',
        url: 'https://api.example.com/games?key=***',
        status: 0,
      });
    });
  });
});
