import {randomUUID} from 'node:crypto'
import {createServer, type AddressInfo} from 'node:net'

import type {Dispatch} from '@lattice/http'
import type {StructuredLogger} from '@lattice/logging'

import type {TransportLimits} from './transport/reader'
import {runRequestWorker} from './worker'

const COMPONENT = 'server.acceptor'

export type ConnectionAcceptorOptions = {
  host: string
  port: number
  dispatch: Dispatch
  limits: TransportLimits
  logger: StructuredLogger
}

/**
 * Owns the listening socket. Every accepted connection gets its own worker;
 * the acceptor never waits for one before accepting the next.
 */
export const createConnectionAcceptor = ({host, port, dispatch, limits, logger}: ConnectionAcceptorOptions) => {
  const server = createServer({allowHalfOpen: true})

  const closed = new Promise<void>(resolve => {
    server.once('close', () => {
      logger.info({event: 'acceptor.stopped', component: COMPONENT})
      resolve()
    })
  })

  server.on('connection', socket => {
    const connectionId = `conn_${randomUUID()}`

    socket.on('error', error => {
      logger.debug({
        event: 'connection.socket_error',
        component: COMPONENT,
        connection_id: connectionId,
        error
      })
    })

    runRequestWorker({socket, connectionId, dispatch, limits, logger}).catch((error: unknown) => {
      logger.error({
        event: 'worker.crashed',
        component: COMPONENT,
        connection_id: connectionId,
        error
      })
      socket.destroy()
    })
  })

  // Once listening, a server error means accepting is broken for good.
  const onServerError = (error: Error) => {
    logger.fatal({
      event: 'acceptor.accept_failed',
      component: COMPONENT,
      reason_code: 'accept_failed',
      error
    })
    server.close()
  }

  const address = (): AddressInfo | undefined => {
    const bound = server.address()
    return bound === null || typeof bound === 'string' ? undefined : bound
  }

  const start = async () =>
    new Promise<void>((resolve, reject) => {
      server.once('error', reject)
      server.listen(port, host, () => {
        server.off('error', reject)
        server.on('error', onServerError)
        logger.info({
          event: 'acceptor.listening',
          component: COMPONENT,
          metadata: {host, port: address()?.port ?? port}
        })
        resolve()
      })
    })

  const stop = async () =>
    new Promise<void>(resolve => {
      server.close(() => resolve())
    })

  return {
    server,
    start,
    stop,
    address,
    closed
  }
}

export type ConnectionAcceptor = ReturnType<typeof createConnectionAcceptor>
