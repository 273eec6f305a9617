// src/core/auth/portal-login.ts
import type { Page } from 'playwright';
import { AuthError, ErrorCode, describeError } from '../errors.js';
import type { AuthOptions, Credentials } from '../config/capture-config.js';

/**
 * Leaves `page` signed in to the portal, or throws `AuthError`.
 * The capture loop only needs the resulting cookies; it never logs in itself.
 */
export interface Authenticator {
  authenticate(page: Page): Promise<void>;
}

export interface PortalLoginOptions extends AuthOptions {
  portalUrl: string;
  credentials: Credentials;
  timeout: number;
}

/** Form-fill login: open portal, follow the login link, submit username and password. */
export class PortalLogin implements Authenticator {
  constructor(private options: PortalLoginOptions) {}

  async authenticate(page: Page): Promise<void> {
    const { portalUrl, loginLinkSelector, usernameSelector, passwordSelector, credentials, timeout } = this.options;

    try {
      console.error(`[INFO] Opening portal: ${portalUrl}`);
      await page.goto(portalUrl, { waitUntil: 'load', timeout });
    } catch (error) {
      throw new AuthError(`Portal unreachable: ${describeError(error)}`, ErrorCode.NAVIGATION_FAILED, { portalUrl });
    }

    if (loginLinkSelector) {
      try {
        await page.waitForSelector(loginLinkSelector, { timeout });
        await page.click(loginLinkSelector);
      } catch {
        console.error('[WARN] Login link not found, assuming the login form is already shown');
      }
    }

    try {
      await page.waitForSelector(usernameSelector, { timeout });
      await page.fill(usernameSelector, credentials.username);
      await page.waitForSelector(passwordSelector, { timeout });
      await page.fill(passwordSelector, credentials.password);
      await page.locator(passwordSelector).press('Enter');
    } catch (error) {
      throw new AuthError(`Login form not usable: ${describeError(error)}`, ErrorCode.LOGIN_REQUIRED, { portalUrl });
    }

    await page.waitForLoadState('networkidle', { timeout }).catch(() => {
      // Portals with long-polling never go idle
    });

    // A password field that is still showing means the portal refused the login
    try {
      await page.waitForSelector(passwordSelector, { state: 'hidden', timeout });
    } catch {
      throw new AuthError('Portal rejected the credentials', ErrorCode.AUTH_REJECTED, { portalUrl });
    }
    console.error('[INFO] Login complete');
  }
}
