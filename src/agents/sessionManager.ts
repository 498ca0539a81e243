/**
 * sessionManager.ts: Console login.
 *
 * `login()` is one form POST to the auth endpoint; the session cookie it sets
 * lands in the ConsoleSession's jar and rides along on every later request.
 * It must be called once, before anything else; nothing enforces that order.
 *
 * The console answers a failed login with the login form again (HTTP 200),
 * so the returned state is a best-effort reading of the response, not a
 * guarantee.  A bad password is not an exception here: the next call that
 * needs authentication will simply get the login page back.
 */

import * as cheerio from 'cheerio';
import type { ConsoleSession } from '../core/consoleSession';
import type { ConsoleResponse, DriverConfig, SessionState } from '../core/types';
import { Logger } from '../core/logger';

const logger = new Logger('SessionManager');

export const AUTH_ENDPOINT = '/repo/?mod=auth';

export class SessionManager {
  private state: SessionState = 'unknown';

  constructor(private readonly session: ConsoleSession) {}

  getSessionState(): SessionState {
    return this.state;
  }

  async login(username: string, password: string): Promise<SessionState> {
    logger.info(`Logging in as "${username}"…`);

    const response = await this.session.post(AUTH_ENDPOINT, { username, password });
    this.state = readLoginState(response);

    if (this.state === 'logged-out') {
      logger.warn('Login form returned again; credentials may be wrong');
    } else {
      logger.info(`Login request sent (state: ${this.state})`);
    }
    return this.state;
  }

  /** Log in with the credentials from the driver configuration. */
  async loginWithConfig(config: Pick<DriverConfig, 'username' | 'password'>): Promise<SessionState> {
    return this.login(config.username, config.password);
  }
}

/**
 * Classify the page returned by the auth POST: a password field means we are
 * still looking at the login form.
 */
export function readLoginState(response: ConsoleResponse): SessionState {
  if (response.statusCode === 401 || response.statusCode === 403) return 'logged-out';
  if (!response.body) return 'unknown';

  const $ = cheerio.load(response.body);
  return $('input[type="password"]').length > 0 ? 'logged-out' : 'logged-in';
}
