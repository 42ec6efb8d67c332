import chalk, { type ChalkInstance } from 'chalk'
import { BuildEventKind, RoleVisibility } from '@hpikit/engine'

export const t = {
  accent: chalk.hex('#4FC3F7'),
  text:   chalk.hex('#C8C8C0'),
  muted:  chalk.hex('#666666'),
  amber:  chalk.hex('#D4880A'),
  green:  chalk.hex('#81C784'),
  red:    chalk.hex('#CF6679'),
} as const

const _eventColors: Record<BuildEventKind, ChalkInstance> = {
  [BuildEventKind.ConfigurationFrozen]: t.muted,
  [BuildEventKind.RewriteAdded]:        t.accent,
  [BuildEventKind.RewriteDuplicate]:    t.amber,
  [BuildEventKind.RoleResolved]:        t.text,
  [BuildEventKind.ManifestFingerprint]: t.muted,
  [BuildEventKind.PackageWritten]:      t.green,
  [BuildEventKind.ArtifactExcluded]:    t.muted,
}

export const eventColor = (kind: BuildEventKind): ChalkInstance => _eventColors[kind]

export const visibilityColor = (visibility: RoleVisibility): ChalkInstance =>
  visibility === RoleVisibility.Exposed ? t.accent : t.muted
