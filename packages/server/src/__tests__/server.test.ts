import {connect} from 'node:net'

import {CaptureStore, capturesKey, path, pathParams} from '@lattice/extract'
import {bodyBytes, createHandler, noRouteMatched, requestVersion, type Dispatch} from '@lattice/http'
import {createStructuredLogger} from '@lattice/logging'
import {afterEach, describe, expect, it} from 'vitest'

import {createConnectionAcceptor} from '../acceptor'
import {createApplication, type Application} from '../application'

const USER_TEAM_ROUTE = /^\/users\/(?<user_id>[^/]+)\/teams\/(?<team_id>[^/]+)$/u

const showMembership = createHandler(
  {
    ids: pathParams(path.tuple([path.integer(), path.integer()])),
    version: requestVersion
  },
  ({ids: [userId, teamId], version}) => `user=${userId} team=${teamId} via ${version}`
)

const echo = createHandler({body: bodyBytes}, ({body}) => body)

const dispatch: Dispatch = async (request, extensions) => {
  if (request.path === '/boom') {
    throw new Error('handler exploded')
  }

  if (request.path === '/echo') {
    return echo({request, extensions})
  }

  const match = USER_TEAM_ROUTE.exec(request.path)
  if (!match?.groups) {
    return noRouteMatched(request)
  }

  extensions.require(capturesKey).merge(CaptureStore.from(Object.entries(match.groups)))
  return showMembership({request, extensions})
}

const createLogBuffer = () => {
  const lines: string[] = []
  const stream = {
    write: (chunk: string | Uint8Array) => {
      lines.push(String(chunk).trim())
      return true
    }
  }

  const events = () =>
    lines.map(line => {
      const parsed: unknown = JSON.parse(line)
      return typeof parsed === 'object' && parsed !== null && 'event' in parsed ? parsed : {event: 'unknown'}
    })

  return {
    logger: createStructuredLogger({
      service: 'lattice-test',
      env: 'test',
      level: 'debug',
      writer: {stdout: stream, stderr: stream}
    }),
    events
  }
}

const exchange = (port: number, payload: string) =>
  new Promise<string>(resolve => {
    const chunks: Buffer[] = []
    const client = connect({host: '127.0.0.1', port}, () => {
      client.end(payload, 'latin1')
    })

    client.on('data', (chunk: Buffer) => chunks.push(chunk))
    // A destroyed server socket may surface as a reset; the collected bytes are what matter.
    client.on('error', () => client.destroy())
    client.on('close', () => resolve(Buffer.concat(chunks).toString('latin1')))
  })

const textReply = ({status, version = 'HTTP/1.1', body}: {status: string; version?: string; body: string}) =>
  `${version} ${status}\r\ncontent-type: text/plain; charset=utf-8\r\ncontent-length: ${Buffer.byteLength(body)}\r\n\r\n${body}`

describe('server', () => {
  let app: Application | undefined

  const startApp = async ({maxHeadBytes = 1024, maxBodyBytes = 64} = {}) => {
    const logs = createLogBuffer()
    const started = createApplication({
      dispatch,
      logger: logs.logger,
      config: {host: '127.0.0.1', port: 0, limits: {maxHeadBytes, maxBodyBytes}}
    })
    app = started
    await started.start()

    const port = started.address()?.port
    if (port === undefined) {
      throw new Error('server is not listening')
    }

    return {port, logs}
  }

  afterEach(async () => {
    await app?.stop()
    app = undefined
  })

  it('extracts both captures into a tuple and finalizes the response', async () => {
    const {port} = await startApp()

    const reply = await exchange(port, 'GET /users/7/teams/9 HTTP/1.1\r\nHost: localhost\r\n\r\n')

    expect(reply).toBe(textReply({status: '200 OK', body: 'user=7 team=9 via HTTP/1.1'}))
  })

  it('answers with the request protocol version', async () => {
    const {port} = await startApp()

    const reply = await exchange(port, 'GET /users/1/teams/2 HTTP/1.0\r\n\r\n')

    expect(reply).toBe(textReply({status: '200 OK', version: 'HTTP/1.0', body: 'user=1 team=2 via HTTP/1.0'}))
  })

  it('renders extraction failures as 400 text responses', async () => {
    const {port} = await startApp()

    const reply = await exchange(port, 'GET /users/7/teams/x HTTP/1.1\r\n\r\n')

    expect(reply).toBe(
      textReply({
        status: '400 Bad Request',
        body: 'Invalid URL: Cannot parse value at index 1 with value `"x"` to a `integer`'
      })
    )
  })

  it('renders invalid UTF-8 captures as 400', async () => {
    const {port} = await startApp()

    const reply = await exchange(port, 'GET /users/%FF/teams/9 HTTP/1.1\r\n\r\n')

    expect(reply).toBe(textReply({status: '400 Bad Request', body: 'Invalid URL: Invalid UTF-8 in `user_id`'}))
  })

  it('answers unmatched paths with 404', async () => {
    const {port} = await startApp()

    const reply = await exchange(port, 'GET /nowhere HTTP/1.1\r\n\r\n')

    expect(reply).toBe(textReply({status: '404 Not Found', body: 'Not Found'}))
  })

  it('passes the request body through', async () => {
    const {port} = await startApp()

    const reply = await exchange(port, 'POST /echo HTTP/1.1\r\nContent-Length: 5\r\n\r\nhello')

    expect(reply).toBe('HTTP/1.1 200 OK\r\ncontent-type: application/octet-stream\r\ncontent-length: 5\r\n\r\nhello')
  })

  it('answers transport failures without dispatching', async () => {
    const {port} = await startApp({maxHeadBytes: 64, maxBodyBytes: 4})

    await expect(exchange(port, 'GET / HTTP/2.0\r\n\r\n')).resolves.toBe(
      textReply({status: '505 HTTP Version Not Supported', body: 'Unsupported HTTP version: HTTP/2.0'})
    )
    await expect(exchange(port, 'POST /echo HTTP/1.1\r\nContent-Length: 10\r\n\r\n')).resolves.toBe(
      textReply({status: '413 Payload Too Large', body: 'Request body exceeds the configured limit'})
    )
    await expect(exchange(port, `GET / HTTP/1.1\r\nX-Padding: ${'a'.repeat(80)}\r\n\r\n`)).resolves.toBe(
      textReply({status: '431 Request Header Fields Too Large', body: 'Request head exceeds the configured limit'})
    )
    await expect(exchange(port, 'POST /echo HTTP/1.1\r\nTransfer-Encoding: chunked\r\n\r\n')).resolves.toBe(
      textReply({status: '501 Not Implemented', body: 'Transfer-Encoding is not supported'})
    )
    await expect(exchange(port, 'POST /echo HTTP/1.1\r\nContent-Length: 4\r\n\r\nab')).resolves.toBe(
      textReply({status: '400 Bad Request', body: 'Connection closed before the request was complete'})
    )
  })

  it('closes quietly when the peer sends nothing', async () => {
    const {port} = await startApp()

    await expect(exchange(port, '')).resolves.toBe('')
  })

  it('isolates a crashing worker from other connections', async () => {
    const {port, logs} = await startApp()

    const [crashed, served] = await Promise.all([
      exchange(port, 'GET /boom HTTP/1.1\r\n\r\n'),
      exchange(port, 'GET /users/3/teams/4 HTTP/1.1\r\n\r\n')
    ])

    expect(crashed).toBe('')
    expect(served).toBe(textReply({status: '200 OK', body: 'user=3 team=4 via HTTP/1.1'}))
    expect(logs.events()).toContainEqual(expect.objectContaining({event: 'worker.crashed', level: 'error'}))
  })

  it('logs completed requests with their status', async () => {
    const {port, logs} = await startApp()

    await exchange(port, 'GET /users/7/teams/9 HTTP/1.1\r\n\r\n')
    await app?.stop()

    expect(logs.events()).toContainEqual(
      expect.objectContaining({
        event: 'request.completed',
        component: 'server.worker',
        status_code: 200,
        method: 'GET',
        route: '/users/7/teams/9'
      })
    )
    expect(logs.events()).toContainEqual(expect.objectContaining({event: 'acceptor.stopped'}))
  })
})

describe('connection acceptor', () => {
  it('stops accepting after a server error', async () => {
    const logs = createLogBuffer()
    const acceptor = createConnectionAcceptor({
      host: '127.0.0.1',
      port: 0,
      dispatch,
      limits: {maxHeadBytes: 1024, maxBodyBytes: 64},
      logger: logs.logger
    })
    await acceptor.start()

    acceptor.server.emit('error', new Error('accept failed'))
    await acceptor.closed

    expect(logs.events()).toContainEqual(
      expect.objectContaining({event: 'acceptor.accept_failed', level: 'fatal', reason_code: 'accept_failed'})
    )
    expect(acceptor.server.listening).toBe(false)
  })

  it('rejects start when the address is taken', async () => {
    const logs = createLogBuffer()
    const first = createConnectionAcceptor({
      host: '127.0.0.1',
      port: 0,
      dispatch,
      limits: {maxHeadBytes: 1024, maxBodyBytes: 64},
      logger: logs.logger
    })
    await first.start()

    const second = createConnectionAcceptor({
      host: '127.0.0.1',
      port: first.address()?.port ?? 0,
      dispatch,
      limits: {maxHeadBytes: 1024, maxBodyBytes: 64},
      logger: logs.logger
    })

    await expect(second.start()).rejects.toThrow(/EADDRINUSE/u)
    await first.stop()
  })
})
