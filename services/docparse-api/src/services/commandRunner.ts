import { execFile } from 'child_process'
import { promisify } from 'util'

const execFileAsync = promisify(execFile)

export type CommandOptions = {
  cwd?: string
  env?: NodeJS.ProcessEnv
  timeoutMs?: number
}

export type CommandOutput = {
  stdout: string
  stderr: string
}

// Every external tool (engine CLI, git, office converter) goes through this
// signature so tests can substitute an in-process fake.
export type CommandRunner = (file: string, args: string[], options?: CommandOptions) => Promise<CommandOutput>

export const runCommand: CommandRunner = async (file, args, options = {}) => {
  const { stdout, stderr } = await execFileAsync(file, args, {
    cwd: options.cwd,
    env: options.env ? { ...process.env, ...options.env } : process.env,
    timeout: options.timeoutMs,
    maxBuffer: 64 * 1024 * 1024,
    encoding: 'utf8'
  })
  return { stdout, stderr }
}

export async function commandExists(runner: CommandRunner, file: string, args: string[] = ['--version']) {
  try {
    await runner(file, args, { timeoutMs: 30000 })
    return true
  } catch {
    return false
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message
  return String(error)
}
