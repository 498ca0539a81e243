import { describe, expect, it, vi } from 'vitest';
import { ConsoleSession } from './consoleSession';
import {
  connectionError,
  fakeConsole,
  formOf,
  testSettings,
  TEST_SERVER,
} from '../testing/fakeConsole';

const gotScrapingImports = vi.hoisted(() => ({ count: 0 }));

vi.mock('got-scraping', () => {
  gotScrapingImports.count++;
  return { gotScraping: vi.fn() };
});

describe('ConsoleSession retry policy', () => {
  for (const failures of [0, 1, 2, 3, 4]) {
    it(`GET succeeds after ${failures} connection failure(s)`, async () => {
      const fake = fakeConsole((_call, index) =>
        index < failures ? connectionError('ECONNREFUSED') : 'ok',
      );
      const session = new ConsoleSession(testSettings, { request: fake.request });

      const response = await session.get('/repo/?mod=upload_file');

      expect(response.body).toBe('ok');
      expect(fake.calls).toHaveLength(failures + 1);
    });
  }

  it('POST succeeds after 4 connection failures', async () => {
    const fake = fakeConsole((_call, index) => (index < 4 ? connectionError('ECONNRESET') : 'posted'));
    const session = new ConsoleSession(testSettings, { request: fake.request });

    const response = await session.post('/repo/?mod=auth', { username: 'u', password: 'p' });

    expect(response.body).toBe('posted');
    expect(fake.calls).toHaveLength(5);
  });

  it('rethrows the fifth connection failure after exactly 5 attempts', async () => {
    const fake = fakeConsole((_call, index) =>
      connectionError('ECONNREFUSED', `attempt ${index + 1}`),
    );
    const session = new ConsoleSession(testSettings, { request: fake.request });

    await expect(session.get('/repo/?mod=upload_file')).rejects.toMatchObject({
      code: 'ECONNREFUSED',
      message: 'attempt 5',
    });
    expect(fake.calls).toHaveLength(5);
  });

  it('stops at 5 attempts even when the server would answer on the sixth', async () => {
    const fake = fakeConsole((_call, index) => (index < 5 ? connectionError('ETIMEDOUT') : 'late'));
    const session = new ConsoleSession(testSettings, { request: fake.request });

    await expect(session.post('/repo/?mod=agent_add', { upload: '1' })).rejects.toMatchObject({
      code: 'ETIMEDOUT',
    });
    expect(fake.calls).toHaveLength(5);
  });

  it('does not retry errors that are not connection failures', async () => {
    const fake = fakeConsole(() => new Error('boom'));
    const session = new ConsoleSession(testSettings, { request: fake.request });

    await expect(session.get('/repo/?mod=upload_file')).rejects.toThrow('boom');
    expect(fake.calls).toHaveLength(1);
  });

  it('returns HTTP error statuses as ordinary responses', async () => {
    const fake = fakeConsole(() => ({ statusCode: 500, body: 'Internal error' }));
    const session = new ConsoleSession(testSettings, { request: fake.request });

    const response = await session.get('/repo/?mod=upload_file');

    expect(response.statusCode).toBe(500);
    expect(response.body).toBe('Internal error');
    expect(fake.calls).toHaveLength(1);
  });

  it('honours a smaller configured attempt count', async () => {
    const fake = fakeConsole(() => connectionError('EAI_AGAIN'));
    const session = new ConsoleSession(
      { ...testSettings, retryAttempts: 2 },
      { request: fake.request },
    );

    await expect(session.get('/x')).rejects.toMatchObject({ code: 'EAI_AGAIN' });
    expect(fake.calls).toHaveLength(2);
  });
});

describe('ConsoleSession requests', () => {
  it('joins the server URL and endpoint, dropping a trailing slash', async () => {
    const fake = fakeConsole(() => 'ok');
    const session = new ConsoleSession(
      { ...testSettings, serverUrl: `${TEST_SERVER}/` },
      { request: fake.request },
    );

    await session.get('/repo/?mod=upload_file');

    expect(fake.calls[0].request.url).toBe(`${TEST_SERVER}/repo/?mod=upload_file`);
    expect(fake.calls[0].request.method).toBe('GET');
  });

  it('url-encodes form posts with repeated keys for arrays', async () => {
    const fake = fakeConsole(() => 'ok');
    const session = new ConsoleSession(testSettings, { request: fake.request });

    await session.post('/repo/?mod=agent_add', {
      'agents[]': ['agent_monk', 'agent_nomos'],
      upload: '12',
    });

    const call = fake.calls[0];
    expect(call.request.headers).toEqual({ 'Content-Type': 'application/x-www-form-urlencoded' });
    expect(call.request.body).toBe('agents%5B%5D=agent_monk&agents%5B%5D=agent_nomos&upload=12');
    expect(formOf(call).getAll('agents[]')).toEqual(['agent_monk', 'agent_nomos']);
  });

  it('sends multipart posts with the browser header profile', async () => {
    const fake = fakeConsole(() => 'ok');
    const session = new ConsoleSession(testSettings, { request: fake.request });

    await session.postMultipart('/repo/?mod=upload_file', [
      ['folder', '3'],
      ['fileInput', { filename: 'a.txt', content: Buffer.from('hello'), contentType: 'text/plain' }],
    ]);

    const { request } = fake.calls[0];
    expect(request.method).toBe('POST');
    expect(request.headers).toEqual({
      Connection: 'keep-alive',
      Pragma: 'no-cache',
      'Cache-Control': 'no-cache',
      'Upgrade-Insecure-Requests': '1',
      Referer: `${TEST_SERVER}/repo/?mod=upload_file`,
    });
    expect(request.body).toBeInstanceOf(FormData);
  });

  it('passes its own cookie jar and timeout on every request', async () => {
    const fake = fakeConsole(() => 'ok');
    const session = new ConsoleSession(testSettings, { request: fake.request });

    await session.get('/a');
    await session.post('/b', {});

    for (const call of fake.calls) {
      expect(call.request.cookieJar).toBe(session.cookies);
      expect(call.request.timeout).toBe(1_000);
    }
  });

  it('keeps cookies apart between sessions', () => {
    const fake = fakeConsole(() => 'ok');
    const first = new ConsoleSession(testSettings, { request: fake.request });
    const second = new ConsoleSession(testSettings, { request: fake.request });

    first.cookies.store('Session=abc; Path=/');

    expect(first.cookies.get('Session')).toBe('abc');
    expect(second.cookies.get('Session')).toBeUndefined();
  });

  it('issues requests in call order', async () => {
    const fake = fakeConsole(async (call) => {
      // The first request answers last; the queue must still hold the others back.
      if (call.endpoint === '/first') await new Promise((r) => setTimeout(r, 20));
      return call.endpoint;
    });
    const session = new ConsoleSession(testSettings, { request: fake.request });

    const bodies = await Promise.all([
      session.get('/first'),
      session.get('/second'),
      session.post('/third', {}),
    ]);

    expect(bodies.map((r) => r.body)).toEqual(['/first', '/second', '/third']);
    expect(fake.calls.map((c) => c.endpoint)).toEqual(['/first', '/second', '/third']);
  });
});

describe('ConsoleSession retry pause', () => {
  it('waits retryDelayMs between attempts and not after the last one', async () => {
    const sentAt: number[] = [];
    const fake = fakeConsole(() => {
      sentAt.push(Date.now());
      return connectionError('ECONNREFUSED');
    });
    const session = new ConsoleSession(
      { ...testSettings, retryDelayMs: 100 },
      { request: fake.request },
    );

    await expect(session.get('/x')).rejects.toMatchObject({ code: 'ECONNREFUSED' });
    const failedAt = Date.now();

    expect(sentAt).toHaveLength(5);
    const pauses = sentAt.slice(1).map((at, i) => at - sentAt[i]);
    expect(pauses).toHaveLength(4);
    for (const pause of pauses) expect(pause).toBeGreaterThanOrEqual(95);
    expect(failedAt - sentAt[4]).toBeLessThan(95);
  });
});

describe('ConsoleSession cancellation', () => {
  it('hands the signal to the request function', async () => {
    const fake = fakeConsole(() => 'ok');
    const session = new ConsoleSession(testSettings, { request: fake.request });
    const controller = new AbortController();

    await session.post('/repo/?mod=auth', {}, { signal: controller.signal });

    expect(fake.calls[0].request.signal).toBe(controller.signal);
  });

  it('sends nothing when the signal has already fired', async () => {
    const fake = fakeConsole(() => 'ok');
    const session = new ConsoleSession(testSettings, { request: fake.request });
    const controller = new AbortController();
    controller.abort();

    await expect(session.get('/x', { signal: controller.signal })).rejects.toMatchObject({
      name: 'AbortError',
    });
    expect(fake.calls).toHaveLength(0);
  });

  it('abandons a request that has not answered', async () => {
    const fake = fakeConsole(async () => {
      await new Promise((resolve) => setTimeout(resolve, 3_000));
      return 'late';
    });
    const session = new ConsoleSession(testSettings, { request: fake.request });
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 50);

    const started = Date.now();
    await expect(session.get('/x', { signal: controller.signal })).rejects.toMatchObject({
      name: 'AbortError',
    });
    expect(Date.now() - started).toBeLessThan(1_000);
  });

  it('stops retrying once the signal fires', async () => {
    const fake = fakeConsole(() => connectionError('ECONNREFUSED'));
    const session = new ConsoleSession(
      { ...testSettings, retryDelayMs: 1_000 },
      { request: fake.request },
    );
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 50);

    const started = Date.now();
    await expect(session.get('/x', { signal: controller.signal })).rejects.toMatchObject({
      name: 'AbortError',
    });
    expect(Date.now() - started).toBeLessThan(1_000);
    expect(fake.calls).toHaveLength(1);
  });
});

describe('ConsoleSession with an injected request function', () => {
  it('never loads got-scraping', async () => {
    const fake = fakeConsole(() => 'ok');
    const session = new ConsoleSession(testSettings, { request: fake.request });

    await session.get('/repo/?mod=upload_file');
    await session.post('/repo/?mod=auth', { username: 'fossy', password: 'test-secret' });

    expect(gotScrapingImports.count).toBe(0);
  });
});
