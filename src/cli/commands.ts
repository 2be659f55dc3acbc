/**
 * Report builders for the lunar-phase CLI. Each returns the lines to print,
 * so the formatting can be checked without spawning a process.
 */

import {
  phaseForDate,
  phasesForMonth,
  positionsForDate,
} from '../api/index.js'
import { fractionalDay, toJulianDay } from '../time/index.js'

export const HELP = `lunar-phase — Moon illumination and bright-limb position angle

Commands:
  phase <year> <month> <day> [hour] [minute] [second]   Phase for one instant
  month <year> <month> [hour]                           One line per day of a month
  moon <year> <month> <day> [hour] [minute] [second]    Moon coordinates and distance
  help                                                  Show this message

Years are astronomical: 0 = 1 BC, -1 = 2 BC. Times are dynamical time (≈ UT).

Examples:
  lunar-phase phase 1992 4 12
  lunar-phase phase 2019 11 17 21 30
  lunar-phase month 2024 2
  lunar-phase moon -500 3 21 12`

/** Thrown for malformed command-line arguments */
export class UsageError extends Error {
  override readonly name = 'UsageError'
}

/**
 * Parse positional numeric arguments. The first `required` names must be
 * present; the rest default to 0.
 */
export function parseNumbers(args: string[], names: string[], required: number): number[] {
  if (args.length < required || args.length > names.length) {
    throw new UsageError(`Expected ${names.slice(0, required).join(' ')}${
      names.length > required ? ` [${names.slice(required).join('] [')}]` : ''
    }`)
  }
  return names.map((name, i) => {
    const raw = args[i]
    if (raw === undefined) return 0
    const value = Number(raw)
    if (raw.trim() === '' || Number.isNaN(value)) {
      throw new UsageError(`${name} must be a number, got '${raw}'`)
    }
    return value
  })
}

const INSTANT_ARGS = ['year', 'month', 'day', 'hour', 'minute', 'second']

/** A bare day may carry its own fraction (4.81); with clock fields it must be whole */
function dayOfMonth(args: string[], day: number, hour: number, minute: number, second: number): number {
  return args.length > 3 ? fractionalDay(day, hour, minute, second) : day
}

/**
 * Split a fractional day into whole day and clock fields, to the nearest
 * second: 4.81 becomes [4, 19, 26, 24].
 */
export function splitDay(day: number): [number, number, number, number] {
  const whole = Math.floor(day)
  const seconds = Math.min(Math.round((day - whole) * 86400), 86399)
  return [whole, Math.floor(seconds / 3600), Math.floor(seconds / 60) % 60, seconds % 60]
}

function instantLabel(year: number, month: number, day: number): string {
  const [d, h, m, s] = splitDay(day)
  return formatDateTime(year, month, d, h, m, s)
}

function pad2(n: number): string {
  return String(n).padStart(2, '0')
}

/** Format a civil date and clock time, e.g. 1992-04-12 00:00:00 */
export function formatDateTime(
  year: number,
  month: number,
  day: number,
  hour = 0,
  minute = 0,
  second = 0,
): string {
  return `${year}-${pad2(month)}-${pad2(day)} ${pad2(hour)}:${pad2(minute)}:${pad2(second)}`
}

/** Illuminated fraction as a percentage with one decimal */
export function formatPercent(fraction: number): string {
  return `${(fraction * 100).toFixed(1)}%`
}

export function formatDegrees(deg: number, digits = 2): string {
  return `${deg.toFixed(digits)}°`
}

export function phaseReport(args: string[]): string[] {
  const [year = 0, month = 0, day = 0, hour = 0, minute = 0, second = 0] =
    parseNumbers(args, INSTANT_ARGS, 3)
  const d = dayOfMonth(args, day, hour, minute, second)
  const jd = toJulianDay(year, month, d)
  const p = phaseForDate(year, month, d)

  return [
    `Moon phase for ${instantLabel(year, month, d)}`,
    `  Julian Day:      ${jd.toFixed(5)}`,
    `  Illuminated:     ${formatPercent(p.illuminatedFraction)}`,
    `  Position angle:  ${formatDegrees(p.positionAngle)}`,
    `  Elongation:      ${formatDegrees(p.elongation)}`,
    `  Phase angle:     ${formatDegrees(p.phaseAngle)}`,
  ]
}

export function monthReport(args: string[]): string[] {
  const [year = 0, month = 0, hour = 0] = parseNumbers(args, ['year', 'month', 'hour'], 2)
  const rows = phasesForMonth(year, month, hour)

  const lines = [`Date         Illuminated  Position angle`]
  for (const row of rows) {
    const day = Math.floor(row.date.day)
    lines.push(
      `${year}-${pad2(month)}-${pad2(day)}  ${formatPercent(row.phase.illuminatedFraction).padStart(11)}  ${
        formatDegrees(row.phase.positionAngle).padStart(14)
      }`,
    )
  }
  return lines
}

export function moonReport(args: string[]): string[] {
  const [year = 0, month = 0, day = 0, hour = 0, minute = 0, second = 0] =
    parseNumbers(args, INSTANT_ARGS, 3)
  const d = dayOfMonth(args, day, hour, minute, second)
  const { moon } = positionsForDate(year, month, d)

  return [
    `Moon position for ${instantLabel(year, month, d)}`,
    `  Ecliptic longitude:  ${formatDegrees(moon.longitude, 6)}`,
    `  Ecliptic latitude:   ${formatDegrees(moon.latitude, 6)}`,
    `  Distance:            ${moon.distance.toFixed(1)} km`,
    `  Right ascension:     ${formatDegrees(moon.rightAscension, 4)}`,
    `  Declination:         ${formatDegrees(moon.declination, 4)}`,
  ]
}
