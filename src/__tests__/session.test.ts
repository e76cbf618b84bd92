import { describe, it, expect, vi, beforeEach } from 'vitest';

const mockGet = vi.fn();
const mockPost = vi.fn();

vi.mock('../logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

vi.mock('httpcloak', () => ({
  default: {
    Session: class MockSession {
      get = mockGet;
      post = mockPost;
      close = vi.fn();
    },
    Preset: {
      CHROME_143: 'chrome_143',
    },
  },
}));

import { extractSessionCookie, negotiateSession, requestHeaders } from '../fetch/session.js';
import { sessionCookieHeader, submitForm } from '../fetch/submit.js';
import { openSession, type ResponseCookie } from '../fetch/http-client.js';
import { NetworkError, SessionCookieNotFoundError } from '../errors.js';
import { cloakResponse, sessionCookie, shindanPage } from './test-helpers.js';

const URL_1 = 'https://en.shindanmaker.com/1234567';

function cookie(name: string, value: string): ResponseCookie {
  return { name, value, domain: 'en.shindanmaker.com', path: '/' };
}

describe('fetch/session', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('extractSessionCookie', () => {
    it('finds the _session cookie among others', () => {
      expect(
        extractSessionCookie([cookie('XSRF-TOKEN', 'x'), cookie('_session', 'test-session')])
      ).toBe('test-session');
    });

    it('throws when the cookie is absent', () => {
      expect(() => extractSessionCookie([cookie('session', 'nope')])).toThrow(
        SessionCookieNotFoundError
      );
    });
  });

  it('sets User-Agent only when configured', () => {
    expect(requestHeaders({ timeout: 3000 })).toEqual({});
    expect(requestHeaders({ timeout: 3000, userAgent: 'test-agent' })).toEqual({
      'User-Agent': 'test-agent',
    });
  });

  describe('negotiateSession', () => {
    it('collects the cookie, tokens and parts fields', async () => {
      mockGet.mockResolvedValue(
        cloakResponse(shindanPage({ parts: ['parts[0]', 'parts[1]'] }), {
          cookies: [sessionCookie('test-session')],
        })
      );

      const negotiated = await negotiateSession(openSession(), URL_1, { timeout: 3000 });
      expect(negotiated.context).toEqual({
        url: URL_1,
        tokenFields: [
          ['_token', 'test-token'],
          ['randname', 'test-randname'],
          ['type', 'name'],
        ],
        partsFields: ['parts[0]', 'parts[1]'],
        sessionCookie: 'test-session',
      });
      expect(negotiated.document.querySelector('#shindanTitle')).not.toBeNull();
    });

    it('fails with NetworkError before looking at cookies', async () => {
      mockGet.mockResolvedValue(
        cloakResponse('Bad Gateway', { ok: false, statusCode: 502, cookies: [sessionCookie()] })
      );
      await expect(negotiateSession(openSession(), URL_1, { timeout: 3000 })).rejects.toThrow(
        NetworkError
      );
    });
  });

  describe('submitForm', () => {
    it('formats the session cookie header', () => {
      expect(sessionCookieHeader('test-session')).toBe('_session=test-session;');
    });

    it('returns the raw result page', async () => {
      mockPost.mockResolvedValue(cloakResponse('<html>result</html>'));
      const context = {
        url: URL_1,
        tokenFields: [['_token', 't']] as const,
        partsFields: [],
        sessionCookie: 'test-session',
      };

      await expect(
        submitForm(openSession(), context, 'Alice', { timeout: 3000, userAgent: 'test-agent' })
      ).resolves.toBe('<html>result</html>');
      expect(mockPost).toHaveBeenCalledWith(URL_1, {
        headers: {
          'Cache-Control': 'no-cache',
          'User-Agent': 'test-agent',
          Cookie: '_session=test-session;',
          'Content-Type': 'application/x-www-form-urlencoded',
        },
        body: '_token=t&user_input_value_1=Alice',
      });
    });
  });
});
