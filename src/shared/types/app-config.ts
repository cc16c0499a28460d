// SPDX-License-Identifier: GPL-2.0-or-later

import {
  DEFAULT_VENDOR_ID,
  DEFAULT_PRODUCT_ID,
  OUTPUT_REPORT_LEN,
  SEND_ATTEMPTS,
  SEND_RETRY_DELAY_MS,
} from '../constants/protocol'

export type LogLevelSetting = 'error' | 'warn' | 'info' | 'debug'

export interface AppConfig {
  vendorId: number
  productId: number
  reportLength: number
  sendAttempts: number
  retryDelayMs: number
  logLevel: LogLevelSetting
  /** Empty means the OS temp directory */
  logDir: string
}

export const SETTABLE_APP_CONFIG_KEYS: ReadonlySet<keyof AppConfig> = new Set([
  'vendorId',
  'productId',
  'reportLength',
  'sendAttempts',
  'retryDelayMs',
  'logLevel',
  'logDir',
])

export const DEFAULT_APP_CONFIG: AppConfig = {
  vendorId: DEFAULT_VENDOR_ID,
  productId: DEFAULT_PRODUCT_ID,
  reportLength: OUTPUT_REPORT_LEN,
  sendAttempts: SEND_ATTEMPTS,
  retryDelayMs: SEND_RETRY_DELAY_MS,
  logLevel: 'info',
  logDir: '',
}
