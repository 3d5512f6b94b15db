import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ConfigError } from './errors';
import { CredentialsSchema } from './schemas';
import type { Credentials } from './types';

const DEFAULT_LOGIN_URL = 'https://webvpn.tsinghua.edu.cn/login?oauth_login=true';
const DEFAULT_TUNNEL_HOST = 'webvpn.tsinghua.edu.cn';
// Seat system as seen through the tunnel
const DEFAULT_API_PREFIX = 'https://webvpn.tsinghua.edu.cn/https/77726476706e69737468656265737421e3f24088693c6152301c9aa596522b204c02212b859d0a19/api.php';

const EnvSchema = z.object({
    SEAT_PROBE_LOGIN_URL: z.string().url().default(DEFAULT_LOGIN_URL),
    /** Host that appears in the address bar once the tunnel login completed */
    SEAT_PROBE_TUNNEL_HOST: z.string().min(1).default(DEFAULT_TUNNEL_HOST),
    SEAT_PROBE_API_PREFIX: z.string().url().default(DEFAULT_API_PREFIX),
    /** Installed browser playwright should drive (chrome, msedge, ...) */
    SEAT_PROBE_BROWSER_CHANNEL: z.string().min(1).default('chrome'),
    /** Explicit browser binary; wins over the channel */
    SEAT_PROBE_BROWSER_PATH: z.string().min(1).optional(),
    SEAT_PROBE_POLL_MS: z.coerce.number().int().positive().default(1000),
});

export interface ProbeConfig {
    loginUrl: string;
    tunnelHost: string;
    /** Base URL of the JSON API, without trailing slash */
    apiPrefix: string;
    browser: {
        channel: string;
        executablePath?: string;
    };
    pollIntervalMs: number;
}

/**
 * Read and validate the probe configuration from environment variables
 *
 * @throws {ConfigError} When a variable is set to an invalid value
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): ProbeConfig => {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        const detail = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
        throw new ConfigError(`Invalid configuration: ${detail}`);
    }
    const vars = parsed.data;

    return {
        loginUrl: vars.SEAT_PROBE_LOGIN_URL,
        tunnelHost: vars.SEAT_PROBE_TUNNEL_HOST,
        apiPrefix: vars.SEAT_PROBE_API_PREFIX.replace(/\/+$/, ''),
        browser: {
            channel: vars.SEAT_PROBE_BROWSER_CHANNEL,
            executablePath: vars.SEAT_PROBE_BROWSER_PATH
        },
        pollIntervalMs: vars.SEAT_PROBE_POLL_MS
    };
};

/**
 * Load `{ username, password }` from a JSON file
 *
 * @throws {ConfigError} When the file is missing, not JSON, or incomplete
 */
export const loadCredentials = async (path: string): Promise<Credentials> => {
    let raw: string;
    try {
        raw = await readFile(path, 'utf-8');
    } catch (error) {
        throw new ConfigError(`Cannot read credentials file ${path}`, { cause: error });
    }

    let json: unknown;
    try {
        json = JSON.parse(raw);
    } catch (error) {
        throw new ConfigError(`Credentials file ${path} is not valid JSON`, { cause: error });
    }

    const credentials = CredentialsSchema.safeParse(json);
    if (!credentials.success) {
        throw new ConfigError(`Credentials file ${path} needs non-empty "username" and "password"`);
    }
    return credentials.data;
};
