// SPDX-License-Identifier: GPL-2.0-or-later

import { loadAppConfig } from './app-config'
import { runCli } from './cli'
import { listDevices, nodeHidTransport } from './hid-service'
import { configureLogger, log } from './logger'

const config = loadAppConfig()
configureLogger({ dir: config.logDir || undefined, level: config.logLevel })

runCli(process.argv.slice(2), {
  config,
  transport: nodeHidTransport,
  listDevices,
  out: (line) => console.log(line),
}).then(
  (code) => {
    process.exitCode = code
  },
  (err: unknown) => {
    log('error', `Unhandled failure: ${err instanceof Error ? err.stack ?? err.message : String(err)}`)
    console.error(err)
    process.exitCode = 1
  },
)
