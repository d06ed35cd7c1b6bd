/**
 * Render session capability.
 *
 * The narrow surface the crawler needs from a browser: load a URL, click,
 * replace the document, and query elements. Elements are returned as their
 * outer HTML so extraction can run on plain strings (and fakes in tests).
 */

export interface SessionCookie {
  name: string;
  value: string;
  domain?: string;
  path?: string;
  /** Unix time in seconds, -1 for session cookies */
  expires?: number;
  httpOnly?: boolean;
  secure?: boolean;
  sameSite?: 'Strict' | 'Lax' | 'None';
}

export interface NavigationResponse {
  ok: boolean;
  /** HTTP status of the main document, null when the browser reported none */
  status: number | null;
}

export interface RenderSession {
  /** Load a URL as a top-level navigation. Rejects with NavigationFailure on transport errors. */
  navigate(url: string): Promise<NavigationResponse>;
  /** Click the first visible element matching the selector. Resolves false when none is visible. */
  click(selector: string): Promise<boolean>;
  /** Replace the current document with the given HTML */
  setContent(html: string): Promise<void>;
  /** Outer HTML of every element matching the selector */
  queryAll(selector: string): Promise<string[]>;
  /** Serialized HTML of the current document */
  content(): Promise<string>;
  currentUrl(): string;
  setCookies(cookies: SessionCookie[]): Promise<void>;
  close(): Promise<void>;
}

export type RenderSessionFactory = () => Promise<RenderSession>;
