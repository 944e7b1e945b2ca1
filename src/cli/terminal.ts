import { createInterface, type Interface } from 'node:readline/promises'
import type { InteractionIO } from '../auth/oauth-orchestrator'
import { openInBrowser } from './browser'

export interface Terminal extends InteractionIO {
  close: () => void
}

export function createTerminal(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Terminal {
  let rl: Interface | null = null

  return {
    print: (line = '') => {
      output.write(`${line}\n`)
    },
    prompt: (question) => {
      rl ??= createInterface({ input, output })
      return rl.question(question)
    },
    openUrl: openInBrowser,
    close: () => {
      rl?.close()
      rl = null
    }
  }
}
