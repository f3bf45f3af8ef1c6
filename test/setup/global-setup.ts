/**
 * Global test setup and teardown
 */

import { mkdtemp, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

let logDir: string | null = null

export async function setup(): Promise<void> {
  logDir = await mkdtemp(join(tmpdir(), 'notiqd-test-'))

  process.env.NODE_ENV = 'test'
  process.env.logLevel = 'silent'
  process.env.port = '3004'
  process.env.enableConsoleOutput = 'false'
  process.env.logDir = logDir
}

export async function teardown(): Promise<void> {
  if (logDir) {
    await rm(logDir, { recursive: true, force: true })
    logDir = null
  }
}
