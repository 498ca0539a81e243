import { describe, expect, it } from 'vitest';
import { SessionManager, readLoginState } from './sessionManager';
import { ConsoleSession } from '../core/consoleSession';
import { fakeConsole, formOf, testSettings } from '../testing/fakeConsole';

const LOGIN_FORM =
  '<form><input name="username"><input type="password" name="password"></form>';

describe('SessionManager.login', () => {
  it('posts the credentials to the auth endpoint', async () => {
    const fake = fakeConsole(() => '<html><body>Welcome</body></html>');
    const auth = new SessionManager(new ConsoleSession(testSettings, { request: fake.request }));

    expect(auth.getSessionState()).toBe('unknown');
    expect(await auth.login('fossy', 'test-secret')).toBe('logged-in');
    expect(auth.getSessionState()).toBe('logged-in');

    const [call] = fake.calls;
    expect(call.endpoint).toBe('/repo/?mod=auth');
    expect(formOf(call).get('username')).toBe('fossy');
    expect(formOf(call).get('password')).toBe('test-secret');
  });

  it('reports logged-out when the login form comes back', async () => {
    const fake = fakeConsole(() => LOGIN_FORM);
    const auth = new SessionManager(new ConsoleSession(testSettings, { request: fake.request }));

    expect(await auth.loginWithConfig({ username: 'fossy', password: 'wrong' })).toBe('logged-out');
  });
});

describe('readLoginState', () => {
  it('classifies responses', () => {
    expect(readLoginState({ statusCode: 403, body: 'Forbidden', headers: {} })).toBe('logged-out');
    expect(readLoginState({ statusCode: 200, body: '', headers: {} })).toBe('unknown');
    expect(readLoginState({ statusCode: 200, body: LOGIN_FORM, headers: {} })).toBe('logged-out');
    expect(readLoginState({ statusCode: 200, body: '<a href="?mod=logout">Logout</a>', headers: {} })).toBe(
      'logged-in',
    );
  });
});
