import { Logger } from '../types/index.js';
import { logger as defaultLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { RenderSession } from './render-session.js';

/**
 * Consent banners, cookie walls and "continue" modals seen on the monitored
 * marketplaces. Text selectors use puppeteer's `::-p-text()` pseudo-element.
 */
export const DEFAULT_OVERLAY_SELECTORS = [
  '#onetrust-accept-btn-handler',
  '#didomi-notice-agree-button',
  "button[data-testid='uc-accept-all-button']",
  "[role='dialog'] button[aria-label='Close']",
  "[role='dialog'] button[aria-label='Cerrar']",
  "[class*='modal'] button[class*='close']",
  'button::-p-text(Accept all)',
  'button::-p-text(Aceptar todo)',
  'button::-p-text(Aceptar)',
  'button::-p-text(Continue)',
  'button::-p-text(Continuar)',
  'button::-p-text(Close)',
  'button::-p-text(Cerrar)',
];

/**
 * Click every visible overlay control once. Must run before any click on page
 * content and again after every navigation, because overlays reappear.
 *
 * @returns number of overlays dismissed
 */
export async function dismissOverlays(
  session: RenderSession,
  selectors: readonly string[] = DEFAULT_OVERLAY_SELECTORS,
  log: Logger = defaultLogger
): Promise<number> {
  let dismissed = 0;

  for (const selector of selectors) {
    try {
      if (await session.click(selector)) {
        dismissed++;
        log.debug('Dismissed overlay', { selector });
      }
    } catch (error) {
      // A control that detached mid-click is no longer in the way
      log.debug('Overlay click failed', { selector, error: errorMessage(error) });
    }
  }

  return dismissed;
}
