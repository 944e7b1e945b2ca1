import { spawn } from 'node:child_process'

export function openerCommand(url: string, platform: NodeJS.Platform = process.platform): [string, string[]] {
  switch (platform) {
    case 'darwin':
      return ['open', [url]]
    case 'win32':
      // The empty string is the window title `start` expects before the target
      return ['cmd', ['/c', 'start', '""', url.replace(/&/g, '^&')]]
    default:
      return ['xdg-open', [url]]
  }
}

/**
 * Launches the platform's default handler for the URL and resolves once the
 * opener has started. The opener is detached: `xdg-open` may stay attached to
 * the browser it launches, and neither must be tied to this process.
 */
export function openInBrowser(url: string): Promise<void> {
  const [command, args] = openerCommand(url)
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { detached: true, stdio: 'ignore' })
    child.once('error', reject)
    child.once('spawn', () => {
      child.unref()
      resolve()
    })
  })
}
