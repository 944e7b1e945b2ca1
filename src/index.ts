import { access, readFile, writeFile } from 'node:fs/promises'
import { OAuthOrchestrator } from './auth/oauth-orchestrator'
import { TokenClient } from './auth/token-client'
import { loadShopConfig, parseEnvFile, resolveEnvPath, updateEnvFile } from './cli/env-file'
import { runSetup } from './cli/setup-wizard'
import { runShop } from './cli/shop'
import { createTerminal } from './cli/terminal'
import { BasketeerError, ConfigError } from './errors'
import { HttpClient } from './http/http-client'

export * from './auth'
export * from './errors'
export { runSetup } from './cli/setup-wizard'
export { runShop } from './cli/shop'

const USAGE = 'Usage: basketeer <init|shop>'

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path)
    return true
  } catch {
    return false
  }
}

async function init(): Promise<void> {
  const terminal = createTerminal()
  const http = new HttpClient()
  const tokenClient = new TokenClient(http)
  try {
    await runSetup({
      io: terminal,
      http,
      tokenClient,
      orchestrator: new OAuthOrchestrator(tokenClient, terminal),
      envPath: resolveEnvPath(),
      fileExists,
      writeFile: (path, content) => writeFile(path, content, 'utf-8')
    })
  } finally {
    terminal.close()
  }
}

async function shop(): Promise<void> {
  const envPath = resolveEnvPath()
  if (!(await fileExists(envPath))) {
    throw new ConfigError(`${envPath} not found. Run "basketeer init" first.`)
  }
  const content = await readFile(envPath, 'utf-8')
  const config = loadShopConfig(parseEnvFile(content))
  await runShop(config, {
    http: new HttpClient(),
    print: (line = '') => console.log(line),
    saveTokens: (vars) => writeFile(envPath, updateEnvFile(content, vars), 'utf-8')
  })
}

export async function main(argv: string[]): Promise<number> {
  const command = argv[0]
  try {
    switch (command) {
      case 'init':
        await init()
        return 0
      case 'shop':
        await shop()
        return 0
      case 'help':
      case '--help':
      case '-h':
        console.log(USAGE)
        return 0
      default:
        console.log(USAGE)
        return 1
    }
  } catch (err) {
    if (err instanceof BasketeerError) {
      console.error(`  Error: ${err.message}`)
      return 1
    }
    throw err
  }
}
