import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'http'
import { URL } from 'url'
import { ListenerUnavailableError } from '../errors'

export const DEFAULT_CALLBACK_TIMEOUT_MS = 5 * 60 * 1000

export type ListenerState = 'listening' | 'captured' | 'timed_out' | 'stopped'

/** Written once by the callback handler, read by the waiter after the signal. */
export interface CallbackCapture {
  code: string | null
}

export interface CallbackListenerOptions {
  port: number
  host?: string
  callbackPath?: string
  successHeading?: string
}

export interface CallbackListener {
  /** The bound port; differs from the requested one only when 0 was asked for */
  readonly port: number
  readonly state: ListenerState
  waitForCode: (timeoutMs?: number) => Promise<string | null>
  close: () => Promise<void>
}

function successPage(heading: string): string {
  return (
    '<html><body style="font-family:system-ui;display:flex;align-items:center;justify-content:center;height:100vh;margin:0">' +
    `<div style="text-align:center"><h1>${heading}</h1><p>You can close this window.</p></div>` +
    '</body></html>'
  )
}

export function startCallbackListener(options: CallbackListenerOptions): Promise<CallbackListener> {
  const host = options.host ?? '127.0.0.1'
  const callbackPath = options.callbackPath ?? '/callback'
  const heading = options.successHeading ?? 'Authorization successful!'

  const capture: CallbackCapture = { code: null }
  let state: ListenerState = 'listening'
  let signal: ((code: string) => void) | null = null
  const captured = new Promise<string>((resolve) => {
    signal = resolve
  })

  function handle(req: IncomingMessage, res: ServerResponse): void {
    const url = new URL(req.url ?? '/', `http://${host}`)
    const code = url.searchParams.get('code')

    const isCallback = req.method === 'GET' && url.pathname === callbackPath

    if (isCallback && code && capture.code !== null) {
      res.writeHead(400, { 'Content-Type': 'text/plain' })
      res.end('Authorization code already received')
      return
    }

    if (isCallback && code) {
      capture.code = code
      state = 'captured'
      res.writeHead(200, { 'Content-Type': 'text/html', Connection: 'close' })
      res.end(successPage(heading))
      signal?.(code)
      return
    }

    res.writeHead(400, { 'Content-Type': 'text/plain' })
    res.end('Missing authorization code')
  }

  return new Promise((resolve, reject) => {
    const server: Server = createServer(handle)

    let closing: Promise<void> | null = null
    function close(): Promise<void> {
      if (!closing) {
        closing = new Promise<void>((done) => {
          // A browser may hold a request open; don't let it pin the port
          const force = setTimeout(() => server.closeAllConnections(), 1000)
          force.unref()
          server.close(() => {
            clearTimeout(force)
            done()
          })
          server.closeIdleConnections()
        })
        closing = closing.then(() => {
          state = 'stopped'
        })
      }
      return closing
    }

    function waitForCode(timeoutMs = DEFAULT_CALLBACK_TIMEOUT_MS): Promise<string | null> {
      let timeoutHandle: ReturnType<typeof setTimeout> | null = null
      const expired = new Promise<null>((res) => {
        timeoutHandle = setTimeout(() => res(null), timeoutMs)
      })

      return Promise.race([captured, expired]).then((code) => {
        if (timeoutHandle) clearTimeout(timeoutHandle)
        if (code === null && capture.code === null && state === 'listening') {
          state = 'timed_out'
        }
        return code ?? capture.code
      })
    }

    let bound = false
    server.on('error', (err) => {
      if (!bound) {
        reject(new ListenerUnavailableError(options.port, err))
        return
      }
      console.warn(`[callback-listener] Server error on port ${options.port}:`, err)
    })

    server.listen(options.port, host, () => {
      const addr = server.address()
      if (!addr || typeof addr === 'string') {
        server.close()
        reject(new ListenerUnavailableError(options.port, new Error('Failed to get server address')))
        return
      }

      bound = true
      resolve({
        port: addr.port,
        get state() {
          return state
        },
        waitForCode,
        close
      })
    })
  })
}
