import type {Dispatch} from '@lattice/http'
import type {StructuredLogger} from '@lattice/logging'

import {createConnectionAcceptor} from './acceptor'
import type {ServerConfig} from './config'

export type ApplicationConfig = Pick<ServerConfig, 'host' | 'port' | 'limits'>

export const createApplication = ({
  dispatch,
  config,
  logger
}: {
  dispatch: Dispatch
  config: ApplicationConfig
  logger: StructuredLogger
}) => {
  const acceptor = createConnectionAcceptor({
    host: config.host,
    port: config.port,
    limits: config.limits,
    // Shared by every worker and never replaced after startup.
    dispatch: Object.freeze(dispatch),
    logger
  })

  return Object.freeze({
    start: acceptor.start,
    stop: acceptor.stop,
    address: acceptor.address,
    /** Settles once the acceptor has stopped, whether through `stop()` or an accept failure. */
    closed: acceptor.closed
  })
}

export type Application = ReturnType<typeof createApplication>
