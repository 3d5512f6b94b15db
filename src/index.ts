/**
 * Library Seat Probe
 *
 * Logs in through the campus tunnel once, then walks
 * library → floor → section → day segment → seats and prints what it finds.
 *
 * Usage:
 *   npm start                          # automatic login, today
 *   npm start -- --manual              # log in yourself in the browser window
 *   npm start -- --tomorrow            # query tomorrow's availability
 *   npm start -- --secrets path.json   # credentials file (default secrets.json)
 *   npm start -- --library 0 --floor 1 --section 2
 */

import { createInterface } from 'node:readline/promises';
import { launchChromium } from './auth/browser';
import { AutomaticLogin, ManualLogin, type CredentialExchange } from './auth/credential-bridge';
import { parseArgs, pick, type ProbeArgs } from './cli';
import { ResourceClient } from './client';
import { loadConfig, loadCredentials, type ProbeConfig } from './config';
import { HierarchyWalker } from './domain/walker';
import { summarizeSeats, describeSeatStatus } from './domain/status';
import logger from './logger';
import type { TransportContext } from './types';

const waitForEnter = async (): Promise<void> => {
    const prompt = createInterface({ input: process.stdin, output: process.stdout });
    try {
        await prompt.question('Press Enter after you have logged in...');
    } finally {
        prompt.close();
    }
}

const createExchange = async (args: ProbeArgs, config: ProbeConfig): Promise<CredentialExchange> => {
    const launch = launchChromium(config.browser);
    if (args.manual) {
        return new ManualLogin({ launch, loginUrl: config.loginUrl, confirm: waitForEnter });
    }

    const credentials = await loadCredentials(args.secrets);
    return new AutomaticLogin(credentials, {
        launch,
        loginUrl: config.loginUrl,
        tunnelHost: config.tunnelHost,
        pollIntervalMs: config.pollIntervalMs
    });
}

async function main(): Promise<void> {
    const args = parseArgs(process.argv.slice(2));
    const config = loadConfig();
    const exchange = await createExchange(args, config);

    let context: TransportContext;
    try {
        context = await exchange.exchange();
    } catch (error) {
        if (!args.manual) {
            logger.warn('Automatic login failed. Try logging in manually with --manual');
        }
        throw error;
    }

    const walker = new HierarchyWalker(new ResourceClient(context), { apiPrefix: config.apiPrefix });

    const libraries = await walker.listLibraries();
    logger.info({ libraries }, 'Libraries');
    const library = pick(libraries, args.library, 'library');

    const floors = await walker.listFloors(library);
    logger.info({ floors }, `Floors of ${library.name}`);
    const floor = pick(floors, args.floor, 'floor');

    const sections = await walker.listSections(floor, args.day);
    logger.info({ sections }, `Sections of ${floor.name}`);
    const section = pick(sections, args.section, 'section');

    const segment = await walker.resolveDay(section, args.day);
    logger.info({ segment }, `Opening hours of ${section.name}`);

    const seats = await walker.listSeats(section, segment);
    logger.info(
        { seats: seats.map(seat => ({ ...seat, label: describeSeatStatus(seat.status) })) },
        `Seats of ${section.name}`
    );
    logger.info({ summary: summarizeSeats(seats) }, `${section.name} on ${segment.date}`);
}

main().catch((error: unknown) => {
    logger.error({ err: error }, 'Seat probe failed');
    process.exitCode = 1;
});
