import type {Socket} from 'node:net'

import {CaptureStore, capturesKey} from '@lattice/extract'
import {
  Extensions,
  finalizeResponse,
  httpErrorResponse,
  isHttpError,
  resolveDispatchOutcome,
  type Dispatch,
  type HttpResponse
} from '@lattice/http'
import {runWithLogContext, setLogContextFields, type StructuredLogger} from '@lattice/logging'

import {readRequest, type TransportLimits} from './transport/reader'
import {writeResponse} from './transport/writer'

const COMPONENT = 'server.worker'

export type RequestWorkerOptions = {
  socket: Socket
  connectionId: string
  dispatch: Dispatch
  limits: TransportLimits
  logger: StructuredLogger
}

const respond = async ({
  socket,
  response,
  logger
}: {
  socket: Socket
  response: HttpResponse
  logger: StructuredLogger
}) => {
  try {
    await writeResponse({socket, response})
    return true
  } catch (error) {
    logger.warn({
      event: 'response.write_failed',
      component: COMPONENT,
      reason_code: isHttpError(error) ? error.code : 'socket_write_failed',
      status_code: response.status >= 100 && response.status <= 599 ? response.status : undefined,
      error
    })
    socket.destroy()
    return false
  }
}

const serveConnection = async ({socket, dispatch, limits, logger}: RequestWorkerOptions) => {
  const startedAt = Date.now()

  const read = await readRequest({socket, limits})
  if (!read.ok) {
    logger.warn({
      event: 'request.parse_failed',
      component: COMPONENT,
      reason_code: read.error.code,
      status_code: read.error.status,
      message: read.error.message
    })
    await respond({
      socket,
      logger,
      response: finalizeResponse({response: httpErrorResponse(read.error), version: 'HTTP/1.1'})
    })
    return
  }

  const request = read.value
  if (!request) {
    socket.end()
    return
  }

  setLogContextFields({method: request.method, route: request.path})

  const extensions = new Extensions()
  extensions.set(capturesKey, CaptureStore.empty())

  const outcome = await dispatch(request, extensions)
  const response = finalizeResponse({response: resolveDispatchOutcome(outcome), version: request.version})

  if (await respond({socket, response, logger})) {
    logger.info({
      event: 'request.completed',
      component: COMPONENT,
      status_code: response.status,
      duration_ms: Date.now() - startedAt,
      metadata: {outcome: outcome.kind}
    })
  }
}

/**
 * Serves exactly one request on an accepted connection. Never rejects: any
 * failure is logged and the connection is destroyed, leaving other workers
 * untouched.
 */
export const runRequestWorker = async (options: RequestWorkerOptions): Promise<void> =>
  runWithLogContext(
    {
      connection_id: options.connectionId,
      ...(options.socket.remoteAddress ? {remote_address: options.socket.remoteAddress} : {}),
      ...(options.socket.remotePort === undefined ? {} : {remote_port: options.socket.remotePort})
    },
    async () => {
      try {
        await serveConnection(options)
      } catch (error) {
        options.logger.error({
          event: 'worker.crashed',
          component: COMPONENT,
          reason_code: 'worker_crashed',
          error
        })
        options.socket.destroy()
      }
    }
  )
