import { describe, it, expect } from 'vitest';
import { createTransportContext } from '../store/transport-context';
import type { BrowserCookie } from '../types';

const cookie = (overrides: Partial<BrowserCookie>): BrowserCookie => ({
    name: 'ticket',
    value: 'test-ticket',
    domain: 'webvpn.example.test',
    path: '/',
    expires: -1,
    httpOnly: true,
    secure: true,
    ...overrides,
});

describe('Transport context', () => {
    const cookies = [
        cookie({}),
        cookie({ name: 'scoped', value: 'admin-only', path: '/admin' }),
        cookie({ name: 'sso', value: 'id-only', domain: '.id.example.test' }),
    ];

    it('should keep each cookie scoped to its domain and path', async () => {
        const { jar } = await createTransportContext(cookies, 'test-agent');

        expect(await jar.getCookieString('https://webvpn.example.test/api.php/areas/1')).toBe('ticket=test-ticket');
        expect(await jar.getCookieString('https://webvpn.example.test/admin/panel')).toBe('scoped=admin-only; ticket=test-ticket');
        expect(await jar.getCookieString('https://login.id.example.test/')).toBe('sso=id-only');
    });

    it('should not send secure cookies over plain http', async () => {
        const { jar } = await createTransportContext(cookies, 'test-agent');

        expect(await jar.getCookieString('http://webvpn.example.test/')).toBe('');
    });

    it('should drop cookies that already expired', async () => {
        const { jar } = await createTransportContext([cookie({ expires: 1_000_000 })], 'test-agent');

        expect(await jar.getCookieString('https://webvpn.example.test/')).toBe('');
    });

    it('should attach the user agent as a fixed header', async () => {
        const context = await createTransportContext(cookies, 'Mozilla/5.0 test-agent');

        expect(context.headers).toEqual({ 'User-Agent': 'Mozilla/5.0 test-agent' });
        expect(Object.isFrozen(context.headers)).toBe(true);
    });
});
