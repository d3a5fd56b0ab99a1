import { initDebugFlags } from '@droidcast/shared'
import { exitCodeFor, installSignalHandlers } from './cli.js'
import { loadConfig } from './config.js'
import { runSender } from './run.js'
import { ProcessSupervisor } from './services/process-supervisor.js'
import { nodeSystemHost } from './services/system-host.js'

async function main(): Promise<number> {
  initDebugFlags()

  const config = loadConfig()
  const supervisor = new ProcessSupervisor()

  installSignalHandlers({
    signals: process,
    supervisor,
    exit: (code) => process.exit(code),
  })

  return runSender(config, { host: nodeSystemHost, supervisor })
}

main()
  .then((status) => {
    process.exitCode = status
  })
  .catch((error: unknown) => {
    process.exitCode = exitCodeFor(error)
  })
