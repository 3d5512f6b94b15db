import { ConfigError } from './errors';
import type { Day } from './types';

export interface ProbeArgs {
    manual: boolean;
    day: Day;
    secrets: string;
    /** 0-based position of the entity to descend into at each level */
    library: number;
    floor: number;
    section: number;
}

const POSITION_FLAGS = {
    '--library': 'library',
    '--floor': 'floor',
    '--section': 'section',
} as const;

const isPositionFlag = (flag: string): flag is keyof typeof POSITION_FLAGS =>
    Object.prototype.hasOwnProperty.call(POSITION_FLAGS, flag);

/**
 * Parse command-line arguments
 *
 * @throws {ConfigError} Unknown flag, missing value or non-integer position
 */
export function parseArgs(argv: readonly string[]): ProbeArgs {
    const args: ProbeArgs = { manual: false, day: 'today', secrets: 'secrets.json', library: 0, floor: 0, section: 0 };

    for (let i = 0; i < argv.length; i++) {
        const flag = argv[i] ?? '';

        if (flag === '--manual') {
            args.manual = true;
        } else if (flag === '--tomorrow') {
            args.day = 'tomorrow';
        } else if (flag === '--secrets') {
            const path = argv[++i];
            if (!path) throw new ConfigError('--secrets expects a file path');
            args.secrets = path;
        } else if (isPositionFlag(flag)) {
            const value = argv[++i];
            const position = Number(value);
            if (value === undefined || value === '' || !Number.isInteger(position) || position < 0) {
                throw new ConfigError(`${flag} expects a non-negative integer, got "${value ?? ''}"`);
            }
            args[POSITION_FLAGS[flag]] = position;
        } else {
            throw new ConfigError(`Unknown argument ${flag}`);
        }
    }

    return args;
}

/**
 * Pick the entity at a position of one hierarchy level
 *
 * @throws {ConfigError} When the level has fewer entries
 */
export function pick<T>(items: readonly T[], position: number, level: string): T {
    const item = items[position];
    if (item === undefined) {
        throw new ConfigError(`No ${level} at position ${position} (found ${items.length})`);
    }
    return item;
}
