import { spawn } from "node:child_process"
import * as fs from "node:fs/promises"
import * as path from "node:path"

import type { TracingLogger } from "@webchat/shared/tracing"

import type { PidRecordStore, ProcessControl } from "./types.js"

/**
 * Process control over real OS processes. Browsers are started detached in
 * their own process group so a signal reaches the renderer children too.
 */
export function createNodeProcessControl(logger?: TracingLogger): ProcessControl {
  return {
    spawn: (command, args) => spawnDetached(command, args, logger),
    isAlive,
    signal: signalGroup,
  }
}

function spawnDetached(command: string, args: string[], logger?: TracingLogger): number {
  const child = spawn(command, args, { detached: true, stdio: "ignore" })
  child.on("error", (err) => {
    logger?.error("Browser process error", { command, error: err.message })
  })
  child.unref()
  if (child.pid === undefined) {
    throw new Error(`Failed to spawn '${command}'`)
  }
  return child.pid
}

function isAlive(pid: number): boolean {
  try {
    process.kill(pid, 0)
    return true
  } catch (err) {
    // EPERM: the process exists but belongs to someone else
    return errorCode(err) === "EPERM"
  }
}

function signalGroup(pid: number, signal: NodeJS.Signals): void {
  try {
    process.kill(-pid, signal)
    return
  } catch (err) {
    if (errorCode(err) !== "ESRCH") throw err
  }
  try {
    process.kill(pid, signal)
  } catch (err) {
    if (errorCode(err) !== "ESRCH") throw err
  }
}

function errorCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "string") {
    return err.code
  }
  return undefined
}

/** PID record kept as a one-line text file. */
export class FilePidRecord implements PidRecordStore {
  readonly filePath: string

  constructor(filePath: string) {
    this.filePath = filePath
  }

  async read(): Promise<number | null> {
    let raw: string
    try {
      raw = await fs.readFile(this.filePath, "utf8")
    } catch (err) {
      if (errorCode(err) === "ENOENT") return null
      throw err
    }
    const pid = Number.parseInt(raw.trim(), 10)
    return Number.isInteger(pid) && pid > 0 ? pid : null
  }

  async write(pid: number): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true })
    await fs.writeFile(this.filePath, `${pid}\n`, "utf8")
  }

  async remove(): Promise<void> {
    await fs.rm(this.filePath, { force: true })
  }
}
