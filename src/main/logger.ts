// SPDX-License-Identifier: GPL-2.0-or-later
// Rotating file logger writing to the configured log directory

import { join } from 'node:path'
import { tmpdir } from 'node:os'
import {
  existsSync,
  mkdirSync,
  statSync,
  renameSync,
  unlinkSync,
  appendFileSync,
} from 'node:fs'

const LOG_FILE_PREFIX = 'dualsense-output-'
const LOG_FILE_EXT = '.log'
const MAX_FILE_SIZE = 5 * 1024 * 1024 // 5 MB
const MAX_GENERATIONS = 5 // dualsense-output-0.log through dualsense-output-4.log

export type LogLevel = 'info' | 'warn' | 'error' | 'debug'

const LEVEL_ORDER: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
}

export interface LoggerOptions {
  dir?: string
  level?: LogLevel
}

let logDir = ''
let minLevel: LogLevel = 'info'
let initialized = false

export function configureLogger(options: LoggerOptions): void {
  if (options.dir !== undefined && options.dir !== logDir) {
    logDir = options.dir
    initialized = false
  }
  if (options.level !== undefined) {
    minLevel = options.level
  }
}

function getLogDir(): string {
  if (!logDir) {
    logDir = join(tmpdir(), 'dualsense-output', 'logs')
  }
  return logDir
}

function logFilePath(generation: number): string {
  return join(getLogDir(), `${LOG_FILE_PREFIX}${generation}${LOG_FILE_EXT}`)
}

function ensureLogDir(): void {
  const dir = getLogDir()
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true })
  }
}

function rotate(): void {
  const oldest = logFilePath(MAX_GENERATIONS - 1)
  if (existsSync(oldest)) {
    unlinkSync(oldest)
  }
  for (let i = MAX_GENERATIONS - 2; i >= 0; i--) {
    const src = logFilePath(i)
    if (existsSync(src)) {
      renameSync(src, logFilePath(i + 1))
    }
  }
}

function shouldRotate(): boolean {
  const current = logFilePath(0)
  if (!existsSync(current)) return false
  return statSync(current).size >= MAX_FILE_SIZE
}

function formatTimestamp(): string {
  return new Date().toISOString()
}

export function isLevelEnabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] <= LEVEL_ORDER[minLevel]
}

function write(level: LogLevel, message: string): void {
  if (!initialized) {
    ensureLogDir()
    initialized = true
  }
  if (shouldRotate()) {
    rotate()
  }
  const line = `[${formatTimestamp()}] [${level.toUpperCase()}] ${message}\n`
  appendFileSync(logFilePath(0), line, 'utf-8')
}

export function log(level: LogLevel, message: string): void {
  if (isLevelEnabled(level)) write(level, message)
}

/** Hex dump of a report; enabled by DUALSENSE_DEBUG_HID regardless of level. */
export function logHidPacket(direction: 'TX' | 'RX', data: Uint8Array): void {
  if (!process.env.DUALSENSE_DEBUG_HID) return
  const hex = Array.from(data)
    .map((b) => b.toString(16).padStart(2, '0'))
    .join(' ')
  write('debug', `HID ${direction}: ${hex}`)
}

export function getLogPath(): string {
  return logFilePath(0)
}
