import { Cookie, CookieJar } from 'tough-cookie';
import type { BrowserCookie, TransportContext } from '../types';

/**
 * Build the reusable transport context from a browser's login state
 *
 * Each cookie is copied into a fresh jar keeping its name, value, domain
 * and path, so it is only ever sent where the browser would have sent it.
 * The jar is not written to afterwards.
 *
 * @param cookies - Cookies read from the browser after login
 * @param userAgent - The browser's navigator.userAgent, sent on every request
 */
export const createTransportContext = async (
    cookies: readonly BrowserCookie[],
    userAgent: string
): Promise<TransportContext> => {
    // The browser already accepted these cookies; skip the public suffix check
    const jar = new CookieJar(undefined, { rejectPublicSuffixes: false });

    for (const browserCookie of cookies) {
        const domain = browserCookie.domain.replace(/^\./, '');
        const cookie = new Cookie({
            key: browserCookie.name,
            value: browserCookie.value,
            domain,
            path: browserCookie.path,
            secure: browserCookie.secure,
            httpOnly: browserCookie.httpOnly,
            expires: browserCookie.expires > 0 ? new Date(browserCookie.expires * 1000) : 'Infinity',
        });
        await jar.setCookie(cookie, `https://${domain}${browserCookie.path}`);
    }

    return {
        jar,
        headers: Object.freeze({ 'User-Agent': userAgent }),
    };
}
