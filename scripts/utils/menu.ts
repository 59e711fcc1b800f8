/**
 * Numbered interactive menu. I/O goes through MenuIO so the loop can run
 * against readline in the CLI and against scripted answers in tests.
 */

import type { RelationshipQuery } from '@family-graph/shared';
import { PERSON_NOT_FOUND, type FamilyRegistry } from '../../core/src/index.js';
import {
  formatAverageAge,
  formatBirthdayCalendar,
  formatChildrenStatistics,
  formatRelationship,
} from './format.js';

export interface MenuIO {
  ask(prompt: string): Promise<string>;
  print(line: string): void;
}

export const NAME_PROMPT = 'Enter the name of the person: ';
export const CHOICE_PROMPT = 'Enter your choice: ';
export const EXIT_CHOICE = '11';

export const MENU_ITEMS = [
  'View Member Details',
  'View Parents',
  'View Grandparents',
  'View Immediate Family',
  'View Extended Family',
  'View Siblings',
  'View Cousins',
  'View Birthday Calendar',
  'View Average Age at Death',
  'View Number of Children and Average Children per Person',
  'Exit',
] as const;

const RELATIONSHIP_CHOICES = new Map<string, RelationshipQuery>([
  ['2', 'parents'],
  ['3', 'grandparents'],
  ['4', 'immediate'],
  ['5', 'extended'],
  ['6', 'siblings'],
  ['7', 'cousins'],
]);

export const renderMenu = (): string[] => [
  '',
  '--- Family Tree Menu ---',
  ...MENU_ITEMS.map((item, i) => `${i + 1}. ${item}`),
];

/**
 * Run one menu choice. Returns false when the user chose to exit.
 */
export async function handleChoice(
  choice: string,
  registry: FamilyRegistry,
  io: MenuIO
): Promise<boolean> {
  const selected = choice.trim();
  const kind = RELATIONSHIP_CHOICES.get(selected);

  if (kind) {
    const name = (await io.ask(NAME_PROMPT)).trim();
    const person = registry.get(name);
    io.print(person ? formatRelationship(kind, name, registry.query(kind, person)) : PERSON_NOT_FOUND);
    return true;
  }

  switch (selected) {
    case '1':
      io.print(registry.describe((await io.ask(NAME_PROMPT)).trim()));
      break;
    case '8':
      formatBirthdayCalendar(registry.birthdayCalendar()).forEach((line) => io.print(line));
      break;
    case '9':
      io.print(formatAverageAge(registry.averageAgeAtDeath()));
      break;
    case '10':
      formatChildrenStatistics(registry.childrenStatistics()).forEach((line) => io.print(line));
      break;
    case EXIT_CHOICE:
      io.print('Exiting the program. Goodbye!');
      return false;
    default:
      io.print('Invalid choice. Please try again.');
  }
  return true;
}

export async function runMenu(registry: FamilyRegistry, io: MenuIO): Promise<void> {
  let running = true;
  while (running) {
    renderMenu().forEach((line) => io.print(line));
    running = await handleChoice(await io.ask(CHOICE_PROMPT), registry, io);
  }
}
