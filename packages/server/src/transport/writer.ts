import {STATUS_CODES} from 'node:http'
import type {Socket} from 'node:net'

import {err, internalServerError, normalizeHeaderName, ok, type HttpResponse} from '@lattice/http'

import type {TransportResult} from './framing'

export const serializeResponse = (response: HttpResponse): TransportResult<Buffer> => {
  if (!Number.isInteger(response.status) || response.status < 100 || response.status > 599) {
    return err(internalServerError('response_status_invalid', `Invalid response status: ${response.status}`))
  }

  const lines = [`${response.version} ${response.status} ${STATUS_CODES[response.status] ?? ''}`]
  for (const header of response.headers) {
    const name = normalizeHeaderName(header.name)
    if (!name.ok) {
      return err(internalServerError('response_header_invalid', name.error))
    }

    if (/[\r\n]/u.test(header.value)) {
      return err(internalServerError('response_header_invalid', `Header \`${name.value}\` contains CR or LF`))
    }

    lines.push(`${header.name}: ${header.value}`)
  }

  return ok(Buffer.concat([Buffer.from(`${lines.join('\r\n')}\r\n\r\n`, 'latin1'), response.body]))
}

/** Writes the response and ends the connection. Rejects when the response cannot be serialized or written. */
export const writeResponse = async ({socket, response}: {socket: Socket; response: HttpResponse}) => {
  const serialized = serializeResponse(response)
  if (!serialized.ok) {
    throw serialized.error
  }

  await new Promise<void>((resolve, reject) => {
    socket.write(serialized.value, error => {
      if (error) {
        reject(error)
        return
      }

      socket.end()
      resolve()
    })
  })
}
