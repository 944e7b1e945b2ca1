import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { OAuthOrchestrator } from '../../src/auth/oauth-orchestrator'
import { TokenClient } from '../../src/auth/token-client'
import { getProviderConfig } from '../../src/auth/oauth-config'
import type { InteractionIO } from '../../src/auth/oauth-orchestrator'
import { pickByNumber, runSetup, type SetupWizardDeps } from '../../src/cli/setup-wizard'
import { SetupError } from '../../src/errors'
import { HttpClient } from '../../src/http/http-client'
import { jsonResponse, requestOf, stubFetch, textResponse } from '../helpers/http'
import { approvingBrowser, recordingIO, scriptedPrompt } from '../helpers/io'

const oneStore = {
  data: [
    {
      locationId: '70100153',
      name: 'Fred Meyer - Hawthorne',
      address: { addressLine1: '100 Test Ave', city: 'Portland', state: 'OR', zipCode: '97214' }
    }
  ]
}

function makeDeps(io: InteractionIO, existing = false) {
  const files = new Map<string, string>()
  const http = new HttpClient()
  const tokenClient = new TokenClient(http)
  const writeFile = vi.fn(async (path: string, content: string) => {
    files.set(path, content)
  })
  const deps: SetupWizardDeps = {
    io,
    http,
    tokenClient,
    orchestrator: new OAuthOrchestrator(tokenClient, io, { callbackTimeoutMs: 5_000 }),
    envPath: '.env',
    fileExists: async () => existing,
    writeFile,
    providers: {
      kroger: { ...getProviderConfig('kroger'), redirectPort: 0 },
      googleTasks: { ...getProviderConfig('google-tasks'), redirectPort: 0 }
    }
  }
  return { deps, files, writeFile }
}

describe('runSetup', () => {
  let mockFetch: ReturnType<typeof stubFetch>

  beforeEach(() => {
    mockFetch = stubFetch()
  })

  afterEach(() => {
    vi.unstubAllGlobals()
  })

  it('runs the retailer flow end to end and persists the tokens and store', async () => {
    mockFetch
      .mockResolvedValueOnce(jsonResponse(200, { access_token: 'abc123', token_type: 'Bearer', expires_in: 1800 }))
      .mockResolvedValueOnce(
        jsonResponse(200, { access_token: 'user-token', refresh_token: 'user-refresh', expires_in: 1800 })
      )
      .mockResolvedValueOnce(jsonResponse(200, oneStore))
    const prompt = scriptedPrompt({
      'Client ID:': ['test-client-id'],
      'Client Secret:': ['test-client-secret'],
      'ZIP code:': ['97214'],
      'Select a store [1]:': [''],
      'Set up Google Tasks? [y/N]:': ['n']
    })
    const { io, lines } = recordingIO({ prompt, openUrl: approvingBrowser('test-auth-code') })
    const { deps, files } = makeDeps(io)

    const result = await runSetup(deps)

    expect(files.get('.env')).toBe(
      'KROGER_CLIENT_ID=test-client-id\n' +
        'KROGER_CLIENT_SECRET=test-client-secret\n' +
        'KROGER_ACCESS_TOKEN=user-token\n' +
        'KROGER_REFRESH_TOKEN=user-refresh\n' +
        'KROGER_STORE_ID=70100153\n'
    )
    expect(result).toEqual({
      kroger: {
        clientId: 'test-client-id',
        clientSecret: 'test-client-secret',
        accessToken: 'user-token',
        refreshToken: 'user-refresh',
        storeId: '70100153'
      },
      googleTasks: null
    })

    // Credential check uses the catalog scope; the store lookup uses that client token
    expect(requestOf(mockFetch, 0).form.get('scope')).toBe('product.compact')
    expect(requestOf(mockFetch, 1).form.get('code')).toBe('test-auth-code')
    expect(requestOf(mockFetch, 2).headers.get('authorization')).toBe('Bearer abc123')
    expect(lines).toContain('    1. Fred Meyer - Hawthorne (100 Test Ave, Portland, OR)')
    expect(lines).toContain('  Skipped.')
  })

  it('adds the task-list block when Google Tasks is set up', async () => {
    mockFetch
      .mockResolvedValueOnce(jsonResponse(200, { access_token: 'abc123' }))
      .mockResolvedValueOnce(jsonResponse(200, { access_token: 'user-token', refresh_token: 'user-refresh' }))
      .mockResolvedValueOnce(jsonResponse(200, oneStore))
      .mockResolvedValueOnce(jsonResponse(200, { access_token: 'google-token', refresh_token: 'google-refresh' }))
      .mockResolvedValueOnce(
        jsonResponse(200, {
          items: [
            { id: 'list-1', title: 'My Tasks' },
            { id: 'list-2', title: 'Groceries' }
          ]
        })
      )
    const prompt = scriptedPrompt({
      'Client ID:': ['test-client-id'],
      'Client Secret:': ['test-client-secret'],
      'ZIP code:': ['97214'],
      'Select a store [1]:': ['1'],
      'Set up Google Tasks? [y/N]:': ['Y'],
      'Google Client ID:': ['google-client-id'],
      'Google Client Secret:': ['google-client-secret'],
      'Select a list [1]:': ['2']
    })
    const { io, lines } = recordingIO({ prompt, openUrl: approvingBrowser('code-for-both') })
    const { deps, files } = makeDeps(io)

    const result = await runSetup(deps)

    expect(result?.googleTasks).toEqual({
      clientId: 'google-client-id',
      clientSecret: 'google-client-secret',
      accessToken: 'google-token',
      refreshToken: 'google-refresh',
      listId: 'list-2'
    })
    expect(files.get('.env')).toContain(
      '\n# Google Tasks shopping list\n' +
        'GOOGLE_CLIENT_ID=google-client-id\n' +
        'GOOGLE_CLIENT_SECRET=google-client-secret\n' +
        'GOOGLE_ACCESS_TOKEN=google-token\n' +
        'GOOGLE_REFRESH_TOKEN=google-refresh\n' +
        'GOOGLE_TASKS_LIST_ID=list-2\n'
    )
    expect(lines).toContain('  Selected: Groceries')

    const googleExchange = requestOf(mockFetch, 3)
    expect(googleExchange.url).toBe('https://oauth2.googleapis.com/token')
    expect(googleExchange.form.get('client_id')).toBe('google-client-id')
    expect(requestOf(mockFetch, 4).headers.get('authorization')).toBe('Bearer google-token')
  })

  it('stops without writing when the user keeps the existing file', async () => {
    const prompt = scriptedPrompt({ 'Overwrite? [y/N]:': [''] })
    const { io, lines } = recordingIO({ prompt })
    const { deps, writeFile } = makeDeps(io, true)

    await expect(runSetup(deps)).resolves.toBeNull()

    expect(writeFile).not.toHaveBeenCalled()
    expect(mockFetch).not.toHaveBeenCalled()
    expect(lines).toContain('  .env already exists.')
    expect(lines).toContain('  Aborted.')
  })

  it('requires both retailer credentials', async () => {
    const prompt = scriptedPrompt({ 'Client ID:': ['test-client-id'], 'Client Secret:': ['  '] })
    const { deps } = makeDeps(recordingIO({ prompt }).io)

    await expect(runSetup(deps)).rejects.toThrow(new SetupError('Both Client ID and Client Secret are required.'))
    expect(mockFetch).not.toHaveBeenCalled()
  })

  it('aborts on rejected credentials before any authorization', async () => {
    mockFetch.mockResolvedValueOnce(textResponse(401, 'Unauthorized'))
    const openUrl = vi.fn(async (_url: string) => {})
    const prompt = scriptedPrompt({ 'Client ID:': ['test-client-id'], 'Client Secret:': ['wrong-secret'] })
    const { deps, writeFile } = makeDeps(recordingIO({ prompt, openUrl }).io)

    await expect(runSetup(deps)).rejects.toThrow('Failed to get client token: 401 Unauthorized')
    expect(openUrl).not.toHaveBeenCalled()
    expect(writeFile).not.toHaveBeenCalled()
  })

  it('asks for a store id when none are found nearby', async () => {
    mockFetch
      .mockResolvedValueOnce(jsonResponse(200, { access_token: 'abc123' }))
      .mockResolvedValueOnce(jsonResponse(200, { access_token: 'user-token' }))
      .mockResolvedValueOnce(jsonResponse(200, { data: [] }))
    const prompt = scriptedPrompt({
      'Client ID:': ['test-client-id'],
      'Client Secret:': ['test-client-secret'],
      'ZIP code:': ['00000'],
      'Enter a store ID manually:': [' 70100999 '],
      'Set up Google Tasks? [y/N]:': ['']
    })
    const { deps } = makeDeps(recordingIO({ prompt, openUrl: approvingBrowser('c') }).io)

    const result = await runSetup(deps)

    expect(result?.kroger.storeId).toBe('70100999')
    expect(result?.kroger.refreshToken).toBe('')
  })

  it('rejects an out-of-range store selection', async () => {
    mockFetch
      .mockResolvedValueOnce(jsonResponse(200, { access_token: 'abc123' }))
      .mockResolvedValueOnce(jsonResponse(200, { access_token: 'user-token' }))
      .mockResolvedValueOnce(jsonResponse(200, oneStore))
    const prompt = scriptedPrompt({
      'Client ID:': ['test-client-id'],
      'Client Secret:': ['test-client-secret'],
      'ZIP code:': ['97214'],
      'Select a store [1]:': ['9']
    })
    const { deps, writeFile } = makeDeps(recordingIO({ prompt, openUrl: approvingBrowser('c') }).io)

    await expect(runSetup(deps)).rejects.toThrow('Invalid selection.')
    expect(writeFile).not.toHaveBeenCalled()
  })

  it('skips the task list when its credentials are missing', async () => {
    mockFetch
      .mockResolvedValueOnce(jsonResponse(200, { access_token: 'abc123' }))
      .mockResolvedValueOnce(jsonResponse(200, { access_token: 'user-token' }))
      .mockResolvedValueOnce(jsonResponse(200, oneStore))
    const prompt = scriptedPrompt({
      'Client ID:': ['test-client-id'],
      'Client Secret:': ['test-client-secret'],
      'ZIP code:': ['97214'],
      'Select a store [1]:': [''],
      'Set up Google Tasks? [y/N]:': ['y'],
      'Google Client ID:': [''],
      'Google Client Secret:': ['']
    })
    const { io, lines } = recordingIO({ prompt, openUrl: approvingBrowser('c') })
    const { deps, files } = makeDeps(io)

    const result = await runSetup(deps)

    expect(result?.googleTasks).toBeNull()
    expect(lines).toContain('  Skipping Google Tasks setup.')
    expect(files.get('.env')).not.toContain('GOOGLE_')
    expect(mockFetch).toHaveBeenCalledTimes(3)
  })
})

describe('pickByNumber', () => {
  const options = ['a', 'b', 'c']

  it('defaults to the first entry', () => {
    expect(pickByNumber(options, '')).toBe('a')
    expect(pickByNumber(options, '  ')).toBe('a')
  })

  it('picks by 1-based position', () => {
    expect(pickByNumber(options, '3')).toBe('c')
  })

  it('rejects out-of-range and non-numeric answers', () => {
    expect(() => pickByNumber(options, '0')).toThrow(SetupError)
    expect(() => pickByNumber(options, '4')).toThrow(SetupError)
    expect(() => pickByNumber(options, 'two')).toThrow('Invalid selection.')
    expect(() => pickByNumber(options, '1.5')).toThrow('Invalid selection.')
  })
})
