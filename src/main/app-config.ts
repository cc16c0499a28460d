// SPDX-License-Identifier: GPL-2.0-or-later
// App configuration backed by conf

import Conf from 'conf'
import { SEND_ATTEMPTS_MAX, SEND_RETRY_DELAY_MAX_MS } from '../shared/constants/protocol'
import { LAYOUT_LEN } from '../shared/report-encoder'
import {
  DEFAULT_APP_CONFIG,
  SETTABLE_APP_CONFIG_KEYS,
  type AppConfig,
  type LogLevelSetting,
} from '../shared/types/app-config'

const LOG_LEVELS: ReadonlySet<string> = new Set(['error', 'warn', 'info', 'debug'])
const MAX_REPORT_LEN = 1024

const store = new Conf<AppConfig>({
  projectName: 'dualsense-output',
  configName: 'config',
  defaults: DEFAULT_APP_CONFIG,
})

export function getAppConfigStore(): Conf<AppConfig> {
  return store
}

function intInRange(value: unknown, min: number, max: number): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= min && value <= max
}

function isLogLevel(value: unknown): value is LogLevelSetting {
  return typeof value === 'string' && LOG_LEVELS.has(value)
}

/**
 * Replace out-of-range or mistyped entries with their defaults.
 * The file on disk is hand-editable, so nothing in it is trusted.
 */
export function sanitizeAppConfig(raw: Partial<Record<keyof AppConfig, unknown>>): AppConfig {
  const d = DEFAULT_APP_CONFIG
  return {
    vendorId: intInRange(raw.vendorId, 0, 0xffff) ? raw.vendorId : d.vendorId,
    productId: intInRange(raw.productId, 0, 0xffff) ? raw.productId : d.productId,
    reportLength: intInRange(raw.reportLength, LAYOUT_LEN, MAX_REPORT_LEN) ? raw.reportLength : d.reportLength,
    sendAttempts: intInRange(raw.sendAttempts, 1, SEND_ATTEMPTS_MAX) ? raw.sendAttempts : d.sendAttempts,
    retryDelayMs: intInRange(raw.retryDelayMs, 0, SEND_RETRY_DELAY_MAX_MS) ? raw.retryDelayMs : d.retryDelayMs,
    logLevel: isLogLevel(raw.logLevel) ? raw.logLevel : d.logLevel,
    logDir: typeof raw.logDir === 'string' ? raw.logDir : d.logDir,
  }
}

export function loadAppConfig(): AppConfig {
  return sanitizeAppConfig(store.store)
}

export function saveAppConfig(config: AppConfig): void {
  store.store = sanitizeAppConfig(config)
}

type ConfigChangeCallback = (key: keyof AppConfig, value: unknown) => void
const changeCallbacks: ConfigChangeCallback[] = []

export function onAppConfigChange(cb: ConfigChangeCallback): void {
  changeCallbacks.push(cb)
}

function isSettableKey(key: string): key is keyof AppConfig {
  for (const settable of SETTABLE_APP_CONFIG_KEYS) {
    if (settable === key) return true
  }
  return false
}

/**
 * Set one key. Unknown keys are ignored and invalid values are rejected,
 * returning false in both cases.
 */
export function setAppConfigValue(key: string, value: unknown): boolean {
  if (!isSettableKey(key)) return false
  const next = sanitizeAppConfig({ ...loadAppConfig(), [key]: value })
  if (next[key] !== value) return false
  store.set(key, next[key])
  for (const cb of changeCallbacks) {
    cb(key, value)
  }
  return true
}
