import { setTimeout as sleep } from 'node:timers/promises';
import { z } from 'zod';
import { AutomationError } from '../errors';
import defaultLogger, { type Logger } from '../logger';
import { createTransportContext } from '../store/transport-context';
import type { BrowserLauncher, BrowserSession } from './browser';
import type { Credentials, TransportContext } from '../types';

/**
 * Turns one browser login into a reusable transport context
 *
 * Implementations differ only in how the login itself happens; callers get
 * the same cookie jar and headers either way.
 */
export interface CredentialExchange {
    exchange(): Promise<TransportContext>;
}

export interface BrowserLoginOptions {
    launch: BrowserLauncher;
    loginUrl: string;
    logger?: Logger;
}

export interface AutomaticLoginOptions extends BrowserLoginOptions {
    /** Host the address bar shows once the tunnel accepted the login */
    tunnelHost: string;
    pollIntervalMs?: number;
    sleep?: (ms: number) => Promise<unknown>;
}

export interface ManualLoginOptions extends BrowserLoginOptions {
    /** Resolves once the user confirms the login is done */
    confirm: () => Promise<void>;
}

const USERNAME_INPUT = '#i_user';
const PASSWORD_INPUT = '#i_pass';
const LOGIN_ACTION = 'doLogin()';

/**
 * Shared login flow: launch, authenticate, capture state, always close
 */
abstract class BrowserLogin implements CredentialExchange {
    protected readonly log: Logger;

    constructor(private readonly options: BrowserLoginOptions) {
        this.log = (options.logger ?? defaultLogger).child({ component: 'credential-bridge' });
    }

    protected abstract authenticate(session: BrowserSession): Promise<void>;

    async exchange(): Promise<TransportContext> {
        let session: BrowserSession;
        try {
            session = await this.options.launch();
        } catch (error) {
            throw new AutomationError('Could not start the browser', { cause: error });
        }

        try {
            await session.open(this.options.loginUrl);
            await this.authenticate(session);

            const cookies = await session.cookies();
            const userAgent = z.string().parse(await session.evaluate('navigator.userAgent'));
            this.log.info({ cookies: cookies.length }, 'Captured browser login state');

            return await createTransportContext(cookies, userAgent);
        } catch (error) {
            throw new AutomationError('Browser login failed', { cause: error });
        } finally {
            await session.close().then(
                () => this.log.info('Browser closed'),
                (error: unknown) => this.log.warn({ err: error }, 'Could not close the browser')
            );
        }
    }
}

/**
 * Fills the SSO form with stored credentials and waits for the tunnel redirect
 */
export class AutomaticLogin extends BrowserLogin {
    private readonly tunnelHost: string;
    private readonly pollIntervalMs: number;
    private readonly sleep: (ms: number) => Promise<unknown>;

    constructor(private readonly credentials: Credentials, options: AutomaticLoginOptions) {
        super(options);
        this.tunnelHost = options.tunnelHost;
        this.pollIntervalMs = options.pollIntervalMs ?? 1000;
        this.sleep = options.sleep ?? sleep;
    }

    protected async authenticate(session: BrowserSession): Promise<void> {
        this.log.info('Browser opened, logging in automatically');
        await session.fill(USERNAME_INPUT, this.credentials.username);
        await session.fill(PASSWORD_INPUT, this.credentials.password);
        await session.evaluate(LOGIN_ACTION);

        while (!session.currentUrl().includes(this.tunnelHost)) {
            await this.sleep(this.pollIntervalMs);
        }
        this.log.info('Login successful');

        // Let the portal finish setting its cookies
        await this.sleep(this.pollIntervalMs);
    }
}

/**
 * Leaves the login to a human and waits for their confirmation
 */
export class ManualLogin extends BrowserLogin {
    private readonly confirm: () => Promise<void>;

    constructor(options: ManualLoginOptions) {
        super(options);
        this.confirm = options.confirm;
    }

    protected async authenticate(): Promise<void> {
        this.log.info('Browser opened, log in through the browser window');
        await this.confirm();
    }
}
