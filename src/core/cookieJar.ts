/**
 * cookieJar.ts: In-memory cookie store owned by one ConsoleSession.
 *
 * The console is a single host, so cookies are keyed by name only; domain and
 * path attributes are ignored.  The class satisfies got's promise-based
 * cookie-jar contract, which lets got attach cookies on every request and pick
 * up `Set-Cookie` headers on redirects (the login POST answers with a 302).
 */

export interface StoredCookie {
  name: string;
  value: string;
}

export class CookieJar {
  private cookies = new Map<string, string>();

  /** Called by got before each request. */
  async getCookieString(_url: string): Promise<string> {
    return this.toHeader();
  }

  /** Called by got for every `Set-Cookie` header. */
  async setCookie(rawCookie: string, _url: string): Promise<void> {
    this.store(rawCookie);
  }

  /** Parse and apply one `Set-Cookie` header value. */
  store(rawCookie: string): void {
    const [pair, ...attributes] = rawCookie.split(';');
    const eq = pair.indexOf('=');
    if (eq <= 0) return;

    const name = pair.slice(0, eq).trim();
    const value = pair.slice(eq + 1).trim();

    if (isExpired(attributes) || value === 'deleted') {
      this.cookies.delete(name);
      return;
    }
    this.cookies.set(name, value);
  }

  get(name: string): string | undefined {
    return this.cookies.get(name);
  }

  list(): StoredCookie[] {
    return [...this.cookies].map(([name, value]) => ({ name, value }));
  }

  toHeader(): string {
    return this.list()
      .map((c) => `${c.name}=${c.value}`)
      .join('; ');
  }

  clear(): void {
    this.cookies.clear();
  }

  get size(): number {
    return this.cookies.size;
  }
}

function isExpired(attributes: string[]): boolean {
  for (const attr of attributes) {
    const [rawKey, ...rest] = attr.split('=');
    const key = rawKey.trim().toLowerCase();
    const val = rest.join('=').trim();

    if (key === 'max-age') {
      const seconds = Number(val);
      if (Number.isFinite(seconds) && seconds <= 0) return true;
    }
    if (key === 'expires') {
      const when = Date.parse(val);
      if (!Number.isNaN(when) && when <= Date.now()) return true;
    }
  }
  return false;
}
