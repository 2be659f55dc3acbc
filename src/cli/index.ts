/**
 * lunar-phase CLI
 *
 * Commands:
 *   lunar-phase phase <year> <month> <day> [hour] [minute] [second]
 *   lunar-phase month <year> <month> [hour]
 *   lunar-phase moon <year> <month> <day> [hour] [minute] [second]
 */

import { HELP, monthReport, moonReport, phaseReport } from './commands.js'

const args = process.argv.slice(2)
const command = args[0]

function main() {
  switch (command) {
    case 'phase':
      print(phaseReport(args.slice(1)))
      break
    case 'month':
      print(monthReport(args.slice(1)))
      break
    case 'moon':
      print(moonReport(args.slice(1)))
      break
    case 'help':
    case undefined:
      console.log(HELP)
      break
    default:
      console.error(`Unknown command: ${command}\n`)
      console.error(HELP)
      process.exit(1)
  }
}

function print(lines: string[]) {
  for (const line of lines) console.log(line)
}

try {
  main()
} catch (err) {
  console.error(err instanceof Error ? err.message : String(err))
  process.exit(1)
}
