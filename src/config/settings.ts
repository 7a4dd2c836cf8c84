import * as fs from 'node:fs'
import * as os from 'node:os'
import * as path from 'node:path'

/** Returns the resolved path to the settings directory (`CHATCMD_HOME` overrides it). */
export function getConfigDir(): string {
  return process.env.CHATCMD_HOME ?? path.join(os.homedir(), '.chatcmd')
}

/** Returns the resolved path to the settings file. */
export function getSettingsPath(): string {
  return path.join(getConfigDir(), 'settings.json')
}

/** Returns true when a settings file already exists. */
export function settingsExist(): boolean {
  return fs.existsSync(getSettingsPath())
}

/** Reads the settings file as untyped JSON; validation happens in the loader. */
export function readSettings(): unknown {
  const raw = fs.readFileSync(getSettingsPath(), 'utf-8')
  return JSON.parse(raw)
}

/** Writes settings to disk, creating the config directory if needed. */
export function writeSettings(settings: unknown): void {
  const dir = getConfigDir()
  fs.mkdirSync(dir, { recursive: true })
  fs.writeFileSync(getSettingsPath(), JSON.stringify(settings, null, 2) + '\n', 'utf-8')
}
