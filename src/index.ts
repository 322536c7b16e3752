import 'dotenv/config'
import { ConfigError, loadConfig, type AppConfig } from './config.js'
import { runCheck, type CheckOutcome } from './core/check-runner.js'
import { appendCheckLog, buildCheckLogEntry } from './infra/check-logger.js'
import {
  createEmailNotifier,
  createTelegramNotifier,
  notifyAll,
  type Notifier,
} from './infra/notifiers.js'
import { fetchForecast, fetchTides } from './infra/stormglass.js'

function buildNotifiers(config: AppConfig): Notifier[] {
  const notifiers: Notifier[] = []
  if (config.email) notifiers.push(createEmailNotifier(config.email))
  if (config.telegram) notifiers.push(createTelegramNotifier(config.telegram))
  return notifiers
}

async function runOnce(config: AppConfig): Promise<CheckOutcome> {
  const start = Date.now()
  const stormglass = {
    apiKey: config.stormglassApiKey,
    forecastDays: config.forecastDays,
    includeWind: config.includeWind,
  }
  const notifiers = buildNotifiers(config)

  const outcome = await runCheck({
    settings: config,
    fetchForecast: (location) => fetchForecast(location, stormglass),
    fetchTides: (location) => fetchTides(location, stormglass),
    notify: (ranges, location) => notifyAll(notifiers, ranges, location),
  })

  appendCheckLog(
    config.checkLogPath,
    buildCheckLogEntry(outcome, Date.now() - start, new Date().toISOString()),
  )
  return outcome
}

async function main(): Promise<number> {
  let config: AppConfig
  try {
    config = loadConfig()
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`config_error ${err.message}`)
      return 1
    }
    throw err
  }

  console.log(
    `surf-check starting locations=${config.locations.length} threshold=${config.waveHeightThreshold}m gap=${config.groupingGapHours}h`,
  )

  const outcome = await runOnce(config)
  if (!outcome.ok) {
    console.error(
      `check_failed source=${outcome.error.source} kind=${outcome.error.kind}`,
    )
    return 1
  }

  console.log(`check_finished status=${outcome.status}`)
  return 0
}

main()
  .then((code) => {
    process.exitCode = code
  })
  .catch((err) => {
    console.error('run_error', err)
    process.exitCode = 1
  })
