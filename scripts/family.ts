#!/usr/bin/env node
/**
 * Family graph CLI
 *
 * Usage:
 *   npx tsx scripts/family.ts <command> [name] [options]
 *
 * Commands:
 *   describe|parents|grandparents|immediate|extended|siblings|cousins <name>
 *   birthdays | average-age | children | members
 *   menu             Interactive numbered menu
 *
 * Options:
 *   --file=PATH      Family seed file (default: $FAMILY_FILE or ./data/sample-family.json)
 *   --verbose        Show loader logging
 */

import chalk from 'chalk';
import { createInterface } from 'readline/promises';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import type { RelationshipQuery } from '@family-graph/shared';

import {
  compareCalendarDates,
  config,
  familyService,
  isFamilyGraphError,
  logger,
  PERSON_NOT_FOUND,
  type FamilyRegistry,
} from '../core/src/index.js';
import {
  formatAverageAge,
  formatBirthdayCalendar,
  formatChildrenStatistics,
  formatRelationship,
  RELATIONSHIP_LABELS,
} from './utils/format.js';
import { logPerson } from './utils/logPerson.js';
import { runMenu } from './utils/menu.js';

interface GlobalArgs {
  file: string;
  verbose: boolean;
}

// Loader chatter is hidden unless --verbose, so command output stays clean
const loadRegistry = (argv: GlobalArgs): FamilyRegistry => {
  config.logSilent = config.logSilent || !argv.verbose;
  return familyService.getRegistry(argv.file);
};

const runRelationship = (kind: RelationshipQuery, argv: GlobalArgs & { name: string }): void => {
  loadRegistry(argv);
  const result = familyService.query(kind, argv.name, argv.file);
  console.log(result.found ? formatRelationship(kind, result.name, result.value) : PERSON_NOT_FOUND);
};

const relationshipCommands: Array<[string, RelationshipQuery]> = [
  ['parents', 'parents'],
  ['grandparents', 'grandparents'],
  ['immediate', 'immediate'],
  ['extended', 'extended'],
  ['siblings', 'siblings'],
  ['cousins', 'cousins'],
];

let cli = yargs(hideBin(process.argv))
  .scriptName('family-graph')
  .option('file', {
    type: 'string',
    describe: 'Family seed file',
    default: config.familyFile,
  })
  .option('verbose', {
    type: 'boolean',
    describe: 'Show loader logging',
    default: false,
  })
  .command(
    'describe <name>',
    'Show member details',
    (y) => y.positional('name', { type: 'string', demandOption: true }),
    (argv) => {
      console.log(loadRegistry(argv).describe(argv.name));
    }
  );

for (const [command, kind] of relationshipCommands) {
  cli = cli.command(
    `${command} <name>`,
    `List ${RELATIONSHIP_LABELS[kind].toLowerCase()} of a member`,
    (y) => y.positional('name', { type: 'string', demandOption: true }),
    (argv) => runRelationship(kind, argv)
  );
}

cli
  .command('birthdays', 'Birthday calendar', {}, (argv) => {
    formatBirthdayCalendar(loadRegistry(argv).birthdayCalendar()).forEach((line) => console.log(line));
  })
  .command('average-age', 'Average age at death', {}, (argv) => {
    console.log(formatAverageAge(loadRegistry(argv).averageAgeAtDeath()));
  })
  .command('children', 'Children per member and average', {}, (argv) => {
    formatChildrenStatistics(loadRegistry(argv).childrenStatistics()).forEach((line) => console.log(line));
  })
  .command('members', 'All members ordered by birth date', {}, (argv) => {
    const members = loadRegistry(argv).members()
      .sort((a, b) => compareCalendarDates(a.birthDate, b.birthDate));
    members.forEach((person, index) => logPerson({ person, index: index + 1 }));
  })
  .command('menu', 'Interactive menu', {}, async (argv) => {
    const registry = loadRegistry(argv);
    const rl = createInterface({ input: process.stdin, output: process.stdout });
    try {
      await runMenu(registry, {
        ask: (prompt) => rl.question(prompt),
        print: (line) => console.log(line),
      });
    } finally {
      rl.close();
    }
  })
  .demandCommand(1, 'Choose a command')
  .strict()
  .help()
  .fail((msg, err, y) => {
    // errors thrown by handlers reach the catch below
    if (err) throw err;
    y.showHelp();
    console.error(`\n${msg}`);
    process.exitCode = 1;
  })
  .parseAsync()
  .catch((err: unknown) => {
    config.logSilent = false;
    if (isFamilyGraphError(err)) {
      logger.error('family', `${chalk.bold(err.code)} ${err.message}`);
    } else {
      logger.error('family', err instanceof Error ? err.stack ?? err.message : String(err));
    }
    process.exitCode = 1;
  });
