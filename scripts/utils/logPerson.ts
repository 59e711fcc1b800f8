/**
 * CLI utility for logging person information with color formatting
 */

import chalk from 'chalk';
import { ageAtDeath, buildLifespan, type Person } from '../../core/src/index.js';

interface LogPersonOptions {
  person: Person;
  icon?: string;
  index?: number;
}

export const formatPersonLine = ({ person, icon, index }: LogPersonOptions): string => {
  const cIndex = index != null
    ? `${chalk.hex('#EEEEEE').inverse(`${index}`.padStart(3, '0'))} `
    : '';
  const cLifespan = chalk
    .hex('#EEEEEE')
    .inverse(buildLifespan(person).padStart(10, ' ').padEnd(12, ' '));
  const cName = chalk.hex('#DEADED').bold(person.name);
  const age = ageAtDeath(person);
  const cAge = age != null ? chalk.gray(`, died aged ${age}`) : chalk.green(' (alive)');
  const cChildren =
    person.children.length > 0
      ? ` ${chalk.hex('#d6406e').bold(`(x${person.children.length})`)}`
      : '';
  const cSpouse = person.spouse ? chalk.blue(`, married to ${person.spouse.name}`) : '';

  return `${icon ? `${icon} ` : ''}${cIndex}${cLifespan} ${cName}${cChildren}${cAge}${cSpouse}`;
};

export const logPerson = (options: LogPersonOptions): void => {
  console.log(formatPersonLine(options));
};

export default logPerson;
