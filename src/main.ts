import { createInterface } from 'node:readline'
import { createAppContext, type AppContext } from '@/app/appContext'
import { loadAppConfig } from '@/config/appConfig'
import { parseInputLine } from '@/features/scanner/scanInput'
import { TerminalController } from '@/features/terminal/terminalController'
import { HELP_TEXT } from '@/features/terminal/renderScreen'
import { ConfigurationLoadError } from '@/shared/errors'
import { logger, setLogLevel } from '@/shared/lib/logger'

function draw(controller: TerminalController, extra?: string): void {
  // Clear screen and move the cursor home
  process.stdout.write('\x1b[2J\x1b[H')
  process.stdout.write(controller.render() + '\n')
  if (extra) {
    process.stdout.write('\n' + extra + '\n')
  }
  process.stdout.write('\n> ')
}

async function run(context: AppContext): Promise<void> {
  const controller = new TerminalController(context)
  const rl = createInterface({ input: process.stdin, terminal: false })

  draw(controller, HELP_TEXT)

  // One line at a time: each scan is fully processed before the next is read
  for await (const line of rl) {
    const event = parseInputLine(line, context.config.keyboardLayout)
    if (!event) {
      draw(controller)
      continue
    }

    const result = await controller.handle(event)
    if (result.quit) break
    draw(controller, result.output)
  }

  rl.close()
}

async function main(): Promise<void> {
  let context: AppContext | null = null

  try {
    const { config, warnings } = loadAppConfig()
    setLogLevel(config.logLevel)
    warnings.forEach(warning => logger.warn(warning))

    context = await createAppContext(config)
    logger.info({ dataDir: config.dataDir, transactionsFile: config.transactionsFile }, 'Stock manager started')

    await run(context)
  } catch (error) {
    if (error instanceof ConfigurationLoadError) {
      logger.fatal({ source: error.source }, error.message)
      process.stderr.write(`\nConfiguration error: ${error.message}\nThe application cannot start with incomplete data.\n`)
      process.exitCode = 1
      return
    }
    logger.fatal({ err: error }, 'Stock manager stopped on an unexpected error')
    process.exitCode = 1
  } finally {
    context?.close()
  }
}

void main()
