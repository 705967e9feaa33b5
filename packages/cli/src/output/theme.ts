import chalk, { type ChalkInstance } from 'chalk'

export const t = {
  blue:    chalk.hex('#4FC3F7'),
  text:    chalk.hex('#C8C8C0'),
  white:   chalk.hex('#F2F2EC'),
  muted:   chalk.hex('#666666'),
  amber:   chalk.hex('#D4880A'),
  green:   chalk.hex('#81C784'),
  red:     chalk.hex('#CF6679'),
} as const

const _outcomeColors: Record<string, ChalkInstance> = {
  accepted: t.green,
  rejected: t.red,
}

export const outcomeColor = (outcome: string): ChalkInstance =>
  _outcomeColors[outcome] ?? t.muted

const _admissionColors: Record<string, ChalkInstance> = {
  registry:    t.blue,
  passthrough: t.amber,
  undeclared:  t.muted,
}

export const admissionColor = (admission: string): ChalkInstance =>
  _admissionColors[admission] ?? t.muted
