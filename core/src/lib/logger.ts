/**
 * Lightweight logger utility with emoji-prefixed action categories and timing.
 *
 * Usage:
 *   logger.seed('load', 'Reading data/sample-family.json...')
 *   // → 🌱 [load] Reading data/sample-family.json...
 *
 *   logger.time('load', 'build-registry')
 *   // ... work ...
 *   logger.timeEnd('load', 'build-registry')
 *   // → ⏱️ [load] build-registry: 4ms
 *
 * Output is suppressed while config.logSilent is set.
 */

import { config } from './config.js';

const ICONS = {
  seed: '🌱',
  link: '🔗',
  query: '🔍',
  warn: '⚠️',
  error: '❌',
  time: '⏱️',
} as const;

type Icon = keyof typeof ICONS;

const timers = new Map<string, number>();

function log(icon: string, ctx: string, msg: string): void {
  if (config.logSilent) return;
  console.log(`${icon} [${ctx}] ${msg}`);
}

function logWarn(icon: string, ctx: string, msg: string): void {
  if (config.logSilent) return;
  console.warn(`${icon} [${ctx}] ${msg}`);
}

function logError(icon: string, ctx: string, msg: string): void {
  if (config.logSilent) return;
  console.error(`${icon} [${ctx}] ${msg}`);
}

function makeLogger(icon: Icon) {
  const emoji = ICONS[icon];
  if (icon === 'error') return (ctx: string, msg: string) => logError(emoji, ctx, msg);
  if (icon === 'warn') return (ctx: string, msg: string) => logWarn(emoji, ctx, msg);
  return (ctx: string, msg: string) => log(emoji, ctx, msg);
}

export const logger = {
  seed: makeLogger('seed'),
  link: makeLogger('link'),
  query: makeLogger('query'),
  warn: makeLogger('warn'),
  error: makeLogger('error'),

  time(ctx: string, label: string): void {
    timers.set(`${ctx}:${label}`, performance.now());
  },

  timeEnd(ctx: string, label: string): void {
    const key = `${ctx}:${label}`;
    const start = timers.get(key);
    if (start === undefined) {
      log(ICONS.time, ctx, `${label}: no timer found`);
      return;
    }
    timers.delete(key);
    const elapsed = performance.now() - start;
    const formatted = elapsed >= 1000
      ? `${(elapsed / 1000).toFixed(1)}s`
      : `${Math.round(elapsed)}ms`;
    log(ICONS.time, ctx, `${label}: ${formatted}`);
  },
};
