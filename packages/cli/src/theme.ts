import chalk, { type ChalkInstance } from 'chalk'
import type { LogLevel } from '@modweave/kernel'

export const t = {
  blue:       chalk.hex('#4FC3F7'),
  blueBright: chalk.hex('#81D4FA'),
  text:       chalk.hex('#C8C8C0'),
  white:      chalk.hex('#F2F2EC'),
  dim:        chalk.hex('#444444'),
  muted:      chalk.hex('#666666'),
  amber:      chalk.hex('#D4880A'),
  green:      chalk.hex('#81C784'),
  red:        chalk.hex('#CF6679'),
} as const

const _levelColors: Record<LogLevel, ChalkInstance> = {
  debug: t.muted,
  info:  t.text,
  warn:  t.amber,
  error: t.red,
}

export const levelColor = (level: LogLevel): ChalkInstance => _levelColors[level]

const _patchColors: Record<string, ChalkInstance> = {
  'applied':        t.green,
  'failed':         t.red,
  'target-missing': t.amber,
}

export const patchStatusColor = (status: string): ChalkInstance =>
  _patchColors[status] ?? t.muted
