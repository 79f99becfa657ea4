#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { promises as fs } from 'fs';
import { createInterface } from 'readline/promises';
import { loadConfig } from './config.js';
import { createLogger } from './logger.js';
import { errorMessage } from './errors.js';
import { HuntStore } from './state/store.js';
import { resolveItemRef } from './state/lookup.js';
import { NominatimGeocoder } from './location/geocoder.js';
import { LocationTracker } from './location/tracker.js';
import { markItemFound, parseCoordinate } from './cli/found.js';
import { printDetail, printList, printStatus } from './reporter/index.js';
import type { HuntItem } from './types/hunt.js';

const GEOCODE_TIMEOUT_MS = 10_000;

const config = loadConfig();
const logger = createLogger(config.logLevel);

interface GlobalOptions {
  file?: string;
}

interface FoundOptions {
  photo?: string;
  address?: string;
  lat?: string;
  lon?: string;
}

const program = new Command();

program
  .name('hunt')
  .description('City scavenger hunt: find all 10 locations, snap a photo at each')
  .version('0.1.0')
  .option('--file <path>', 'Hunt data file', config.dataFile);

async function withStore(run: (store: HuntStore) => Promise<void> | void): Promise<void> {
  const { file } = program.opts<GlobalOptions>();
  const store = await HuntStore.open({ filePath: file ?? config.dataFile, logger });
  try {
    await run(store);
  } finally {
    await store.close();
  }
}

function findItem(store: HuntStore, ref: string): Readonly<HuntItem> | undefined {
  const item = resolveItemRef(store.items, ref);
  if (!item) {
    console.log(chalk.red(`No hunt item matches "${ref}". Use a list number (1-${store.totalCount}) or an id prefix.`));
    process.exitCode = 1;
  }
  return item;
}

program
  .command('list')
  .description('Show every location and its status')
  .action(async () => {
    await withStore(store => printList(store));
  });

program
  .command('status')
  .description('Show the reward banner and progress')
  .action(async () => {
    await withStore(store => printStatus(store));
  });

program
  .command('show <item>')
  .description('Show details for one location')
  .action(async (ref: string) => {
    await withStore(store => {
      const item = findItem(store, ref);
      if (item) printDetail(item);
    });
  });

program
  .command('found <item>')
  .description('Mark a location as found')
  .option('--photo <path>', 'Photo taken at the location (required the first time)')
  .option('--address <text>', 'Address to record')
  .option('--lat <n>', 'Latitude to look up an address for')
  .option('--lon <n>', 'Longitude to look up an address for')
  .action(async (ref: string, opts: FoundOptions) => {
    await withStore(async store => {
      const item = findItem(store, ref);
      if (!item) return;

      let photoData: Uint8Array | undefined;
      if (opts.photo) {
        try {
          photoData = new Uint8Array(await fs.readFile(opts.photo));
        } catch (err) {
          console.log(chalk.red(`Could not read photo: ${errorMessage(err)}`));
          process.exitCode = 1;
          return;
        }
      }

      const coordinate = parseCoordinate(opts.lat, opts.lon);
      if ((opts.lat !== undefined || opts.lon !== undefined) && !coordinate) {
        console.log(chalk.red('Both --lat and --lon are needed, as valid coordinates.'));
        process.exitCode = 1;
        return;
      }

      const tracker = new LocationTracker(new NominatimGeocoder(config.geocoderUrl), logger);
      const spinner = coordinate && opts.address === undefined ? ora('Looking up address...').start() : null;

      const outcome = await markItemFound(
        store,
        item.id,
        {
          photoData,
          address: opts.address,
          coordinate: coordinate ?? undefined,
          signal: AbortSignal.timeout(GEOCODE_TIMEOUT_MS),
        },
        tracker,
      );

      if (spinner) {
        if (tracker.lastAddress) {
          spinner.succeed(tracker.lastAddress);
        } else {
          spinner.warn('No address available');
        }
      }

      if (!outcome.ok) {
        const message = outcome.reason === 'photo-required'
          ? 'Attach a photo with --photo before marking this location as found.'
          : `No hunt item matches "${ref}".`;
        console.log(chalk.red(message));
        process.exitCode = 1;
        return;
      }

      console.log(chalk.green(`✓ Marked "${outcome.item.title}" as found`));
      printStatus(store);
    });
  });

program
  .command('remove-photo <item>')
  .description('Remove the photo from a location (keeps its found status)')
  .action(async (ref: string) => {
    await withStore(store => {
      const item = findItem(store, ref);
      if (!item) return;
      if (!item.photoData) {
        console.log(chalk.dim(`"${item.title}" has no photo.`));
        return;
      }
      store.removePhoto(item.id);
      console.log(chalk.green(`Photo removed from "${item.title}".`));
    });
  });

program
  .command('export-photo <item> <out>')
  .description('Write the stored photo of a location to a file')
  .action(async (ref: string, out: string) => {
    await withStore(async store => {
      const item = findItem(store, ref);
      if (!item) return;
      if (!item.photoData) {
        console.log(chalk.yellow(`"${item.title}" has no photo yet.`));
        process.exitCode = 1;
        return;
      }
      await fs.writeFile(out, item.photoData);
      console.log(chalk.dim(`Photo saved to: ${out}`));
    });
  });

program
  .command('reset')
  .description('Clear all photos, timestamps and addresses')
  .option('--yes', 'Skip the confirmation prompt')
  .action(async (opts: { yes?: boolean }) => {
    await withStore(async store => {
      if (store.foundCount === 0) {
        console.log(chalk.dim('Nothing to reset.'));
        return;
      }

      if (!opts.yes) {
        const rl = createInterface({ input: process.stdin, output: process.stdout });
        try {
          console.log(chalk.bold('Reset progress?'));
          const answer = await rl.question('This will clear all photos, timestamps, and addresses. Type "reset" to confirm: ');
          if (answer.trim().toLowerCase() !== 'reset') {
            console.log(chalk.dim('Cancelled.'));
            return;
          }
        } finally {
          rl.close();
        }
      }

      store.resetAll();
      console.log(chalk.green('Progress reset.'));
    });
  });

program.parseAsync().catch(err => {
  console.error(chalk.red(errorMessage(err)));
  process.exitCode = 1;
});
