#!/usr/bin/env node
import { program, InvalidArgumentError } from 'commander'
import { logger } from './utils/logger.js'
import { getPackageInfo } from './utils/package-info.js'
import { checkHostCompatibility } from './utils/version.js'
import { parsePid, parsePort } from './utils/port.js'
import type { CheckhealthOptions } from './types/index.js'

const packageJson = getPackageInfo()

// Commander reports InvalidArgumentError as a usage error instead of a crash
function asOptionParser(parse: (value: string) => number): (value: string) => number {
  return (value: string) => {
    try {
      return parse(value)
    } catch (error) {
      throw new InvalidArgumentError(error instanceof Error ? error.message : 'Invalid value')
    }
  }
}

program
  .name('livepreview')
  .description(packageJson.description)
  .version(packageJson.version)
  .option('--debug', 'Enable debug output (default: based on LIVEPREVIEW_DEBUG env var)')
  .hook('preAction', (thisCommand) => {
    const options = thisCommand.opts()
    const envDebug = process.env.LIVEPREVIEW_DEBUG === 'true'
    const debugEnabled = options.debug !== undefined ? Boolean(options.debug) : envDebug
    logger.setDebug(debugEnabled)

    // Unsupported Node.js versions keep running in degraded mode
    try {
      const { hostVersion, supportedRange, compatible } = checkHostCompatibility()
      if (!compatible) {
        logger.warn(`livepreview requires Node.js ${supportedRange}, but you are using ${hostVersion}`)
      }
    } catch (error) {
      logger.debug(`Skipping Node.js compatibility check: ${error instanceof Error ? error.message : 'Unknown error'}`)
    }
  })

program
  .command('checkhealth')
  .alias('doctor')
  .description('Check the live-preview environment and whether its server owns the configured port')
  .option('-p, --port <port>', 'Port to check (overrides the configured port)', asOptionParser(parsePort))
  .option('--pid <pid>', 'PID expected to own the port (default: this process)', asOptionParser(parsePid))
  .option('--root <dir>', 'Project directory containing .livepreview/ (default: current directory)')
  .option('--json', 'Print the report as JSON')
  .option('--markdown', 'Print the report as Markdown with environment details')
  .action(async (options: CheckhealthOptions) => {
    try {
      const { CheckhealthCommand } = await import('./commands/checkhealth.js')
      const { reportHasErrors } = await import('./utils/diagnostics.js')
      const command = new CheckhealthCommand()
      const report = await command.execute({ options })
      if (reportHasErrors(report)) {
        process.exitCode = 1
      }
    } catch (error) {
      logger.error(`Failed to run health check: ${error instanceof Error ? error.message : 'Unknown error'}`)
      process.exit(1)
    }
  })

program
  .command('kill')
  .description('Terminate the process holding the preview port')
  .argument('<pid>', 'PID reported by checkhealth', asOptionParser(parsePid))
  .action(async (pid: number) => {
    try {
      const { KillCommand } = await import('./commands/kill.js')
      const command = new KillCommand()
      await command.execute({ pid })
    } catch (error) {
      logger.error(`Failed to terminate process: ${error instanceof Error ? error.message : 'Unknown error'}`)
      process.exit(1)
    }
  })

// Parse CLI arguments
try {
  await program.parseAsync()
} catch (error) {
  if (error instanceof Error) {
    logger.error(`Error: ${error.message}`)
    process.exit(1)
  }
}
