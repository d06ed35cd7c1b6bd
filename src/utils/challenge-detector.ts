/**
 * Recognises anti-bot interstitials and block pages in rendered HTML.
 */

const CHALLENGE_MARKERS = [
  'cf-chl-opt',
  'challenge-platform',
  'cf-browser-verification',
  'just a moment',
  'checking your browser',
  'un momento',
  'verify you are human',
  'captcha-delivery',
  'px-captcha',
];

const BLOCK_MARKERS = [
  'access denied',
  '403 forbidden',
  'error 1020',
  'you have been blocked',
  'request unsuccessful',
];

export type PageVerdict = 'challenge' | 'blocked' | 'clean';

export interface PageAnalysis {
  verdict: PageVerdict;
  /** Marker that produced the verdict, for logging */
  marker: string | null;
  htmlLength: number;
}

export function analyzePage(html: string): PageAnalysis {
  const lower = html.toLowerCase();

  const challenge = CHALLENGE_MARKERS.find(marker => lower.includes(marker));
  if (challenge) {
    return { verdict: 'challenge', marker: challenge, htmlLength: html.length };
  }

  const block = BLOCK_MARKERS.find(marker => lower.includes(marker));
  if (block) {
    return { verdict: 'blocked', marker: block, htmlLength: html.length };
  }

  return { verdict: 'clean', marker: null, htmlLength: html.length };
}

