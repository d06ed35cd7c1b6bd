import * as cheerio from 'cheerio';
import { Logger } from '../types/index.js';
import { NavigationFailure } from '../utils/errors.js';
import { NavigationResponse, RenderSession, SessionCookie } from '../navigation/render-session.js';
import { ChallengeResolver, ResolvedPage } from '../resolver/challenge-resolver-client.js';

export type FakeResponse = { status: number; html: string } | Error;

/**
 * In-process render session over static HTML. Selectors are evaluated with
 * cheerio; clicking a link follows its href, clicking anything else removes
 * the element (the way a dismissed overlay disappears).
 */
export class FakeRenderSession implements RenderSession {
  readonly visits: string[] = [];
  readonly clicks: string[] = [];
  readonly cookies: SessionCookie[] = [];
  contentReplacements = 0;
  closed = false;

  private html = '';
  private url = 'about:blank';
  private readonly routes = new Map<string, FakeResponse[]>();
  private readonly redirects = new Map<string, string>();

  /** Queue responses for a URL; the last one repeats for every later visit */
  route(url: string, ...responses: FakeResponse[]): this {
    this.routes.set(url, responses);
    return this;
  }

  page(url: string, html: string, status = 200): this {
    return this.route(url, { status, html });
  }

  redirect(from: string, to: string): this {
    this.redirects.set(from, to);
    return this;
  }

  async navigate(requestedUrl: string): Promise<NavigationResponse> {
    this.visits.push(requestedUrl);
    const url = this.redirects.get(requestedUrl) ?? requestedUrl;
    const queue = this.routes.get(url);
    const next = queue && queue.length > 1 ? queue.shift() : queue?.[0];

    if (next instanceof Error) {
      throw new NavigationFailure(next.message, url, { cause: next });
    }

    const response = next ?? { status: 404, html: '<html><body>Not found</body></html>' };
    this.url = url;
    this.html = response.html;
    return { ok: response.status >= 200 && response.status < 300, status: response.status };
  }

  async click(selector: string): Promise<boolean> {
    const $ = cheerio.load(this.html);
    const target = this.select($, selector).first();
    if (target.length === 0) return false;

    this.clicks.push(selector);
    const href = target.attr('href');
    if (href) {
      await this.navigate(new URL(href, this.url).toString());
    } else {
      target.remove();
      this.html = $.html();
    }
    return true;
  }

  async setContent(html: string): Promise<void> {
    this.html = html;
    this.contentReplacements++;
  }

  async queryAll(selector: string): Promise<string[]> {
    const $ = cheerio.load(this.html);
    return this.select($, selector)
      .toArray()
      .map(element => $.html(element));
  }

  async content(): Promise<string> {
    return this.html;
  }

  currentUrl(): string {
    return this.url;
  }

  async setCookies(cookies: SessionCookie[]): Promise<void> {
    this.cookies.push(...cookies);
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private select($: cheerio.CheerioAPI, selector: string) {
    try {
      return $(selector);
    } catch {
      // Browser-only selector syntax (e.g. ::-p-text) matches nothing here
      return $('*').slice(0, 0);
    }
  }
}

export type ResolverOutcome = ResolvedPage | Error;

export class FakeResolver implements ChallengeResolver {
  readonly calls: string[] = [];

  constructor(private readonly outcome: ResolverOutcome | ((url: string) => ResolverOutcome)) {}

  async resolve(url: string): Promise<ResolvedPage> {
    this.calls.push(url);
    const outcome = typeof this.outcome === 'function' ? this.outcome(url) : this.outcome;
    if (outcome instanceof Error) {
      throw outcome;
    }
    return outcome;
  }
}

export function resolvedPage(html: string, cookies: SessionCookie[] = []): ResolvedPage {
  return { status: 200, html, cookies, userAgent: 'Mozilla/5.0 test', url: 'https://example.test/' };
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
