/**
 * Tests for the HTTP page renderer against undici's MockAgent
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { MockAgent } from 'undici';
import { HttpPageRenderer } from '../../src/rendering/httpPageRenderer';
import { RunAbortedError, TransportError } from '../../src/utils/errors';

const ORIGIN = 'https://example.com';

let agent: MockAgent;
let renderer: HttpPageRenderer;

beforeEach(() => {
  agent = new MockAgent();
  agent.disableNetConnect();
  renderer = new HttpPageRenderer({ dispatcher: agent, maxRedirections: 0, userAgent: 'test-agent' });
});

afterEach(async () => {
  await renderer.close();
});

describe('HttpPageRenderer.render', () => {
  it('returns the markup of an HTML page', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: '/about', method: 'GET', headers: { 'user-agent': 'test-agent' } })
      .reply(200, '<html><body><p>About</p></body></html>', {
        headers: { 'content-type': 'text/html; charset=utf-8' },
      });

    await expect(renderer.render(`${ORIGIN}/about`, 5000)).resolves.toBe(
      '<html><body><p>About</p></body></html>'
    );
  });

  it('accepts responses without a content type', async () => {
    agent.get(ORIGIN).intercept({ path: '/plain', method: 'GET' }).reply(200, '<p>ok</p>');

    await expect(renderer.render(`${ORIGIN}/plain`, 5000)).resolves.toBe('<p>ok</p>');
  });

  it('fails with the status code on non-2xx responses', async () => {
    agent.get(ORIGIN).intercept({ path: '/gone', method: 'GET' }).reply(404, 'Not Found');

    const error = await renderer.render(`${ORIGIN}/gone`, 5000).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(TransportError);
    if (error instanceof TransportError) {
      expect(error.statusCode).toBe(404);
      expect(error.message).toBe(`HTTP 404 for ${ORIGIN}/gone`);
    }
  });

  it('rejects content that is not HTML', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: '/file', method: 'GET' })
      .reply(200, 'binary', { headers: { 'content-type': 'application/octet-stream' } });

    await expect(renderer.render(`${ORIGIN}/file`, 5000)).rejects.toThrow(
      `Unsupported content type "application/octet-stream" for ${ORIGIN}/file`
    );
  });

  it('wraps connection errors in TransportError', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: '/reset', method: 'GET' })
      .replyWithError(new Error('socket hang up'));

    await expect(renderer.render(`${ORIGIN}/reset`, 5000)).rejects.toBeInstanceOf(TransportError);
  });

  it('fails with RunAbortedError once the run signal fired', async () => {
    agent.get(ORIGIN).intercept({ path: '/slow', method: 'GET' }).reply(200, '<p>late</p>');
    const abort = new AbortController();
    abort.abort();
    const aborted = new HttpPageRenderer({ dispatcher: agent, maxRedirections: 0, signal: abort.signal });

    await expect(aborted.render(`${ORIGIN}/slow`, 5000)).rejects.toBeInstanceOf(RunAbortedError);
  });
});
