import type {Socket} from 'node:net'

import {
  badRequest,
  err,
  headerFieldsTooLarge,
  httpVersionNotSupported,
  isHttpVersion,
  normalizeHeaderName,
  ok,
  payloadTooLarge,
  validateHeaderValue,
  type HeaderList,
  type HttpRequest
} from '@lattice/http'

import {resolveBodyLength, type TransportResult} from './framing'

export type TransportLimits = {
  maxHeadBytes: number
  maxBodyBytes: number
}

export type RequestHead = Omit<HttpRequest, 'body'>

const HEAD_TERMINATOR = Buffer.from('\r\n\r\n', 'latin1')
const METHOD_REGEX = /^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/u
const VERSION_REGEX = /^HTTP\/\d\.\d$/u
// Origin-form or asterisk-form, visible ASCII only.
const REQUEST_TARGET_REGEX = /^(?:\/[\x21-\x7e]*|\*)$/u

const parseHeaderFields = (lines: string[]): TransportResult<HeaderList> => {
  const headers: HeaderList = []

  for (const line of lines) {
    if (line.startsWith(' ') || line.startsWith('\t')) {
      return err(badRequest('header_invalid', 'Obsolete header line folding is not supported'))
    }

    const separator = line.indexOf(':')
    if (separator <= 0) {
      return err(badRequest('header_invalid', 'Header field is missing a name or colon'))
    }

    const rawName = line.slice(0, separator)
    if (rawName.trim() !== rawName) {
      return err(badRequest('header_invalid', 'Whitespace is not allowed around a header name'))
    }

    const name = normalizeHeaderName(rawName)
    if (!name.ok) {
      return err(badRequest('header_invalid', name.error))
    }

    const value = validateHeaderValue(line.slice(separator + 1))
    if (!value.ok) {
      return err(badRequest('header_invalid', value.error))
    }

    headers.push({name: name.value, value: value.value})
  }

  return ok(headers)
}

/** Parses the request line and header fields of a head decoded as latin1, without its final CRLFCRLF. */
export const parseRequestHead = (text: string): TransportResult<RequestHead> => {
  const [requestLine, ...fieldLines] = text.split('\r\n')
  const parts = requestLine.split(' ')
  if (parts.length !== 3) {
    return err(badRequest('request_line_invalid', 'Malformed request line'))
  }

  const [method, target, version] = parts
  if (!METHOD_REGEX.test(method)) {
    return err(badRequest('request_line_invalid', 'Malformed request method'))
  }

  if (!REQUEST_TARGET_REGEX.test(target)) {
    return err(badRequest('request_line_invalid', 'Malformed request target'))
  }

  if (!VERSION_REGEX.test(version)) {
    return err(badRequest('request_line_invalid', 'Malformed HTTP version'))
  }

  if (!isHttpVersion(version)) {
    return err(httpVersionNotSupported('http_version_unsupported', `Unsupported HTTP version: ${version}`))
  }

  const headers = parseHeaderFields(fieldLines)
  if (!headers.ok) {
    return headers
  }

  const queryStart = target.indexOf('?')

  return ok({
    method,
    target,
    path: queryStart === -1 ? target : target.slice(0, queryStart),
    query: queryStart === -1 ? undefined : target.slice(queryStart + 1),
    version,
    headers: headers.value
  })
}

/**
 * Reads one request from the socket. Resolves `ok(null)` when the peer goes
 * away before sending anything. Bytes after the declared body are ignored.
 */
export const readRequest = ({
  socket,
  limits
}: {
  socket: Socket
  limits: TransportLimits
}): Promise<TransportResult<HttpRequest | null>> =>
  new Promise(resolve => {
    let buffered = Buffer.alloc(0)
    let head: RequestHead | undefined
    let bodyOffset = 0
    let bodyLength = 0
    let settled = false

    const finish = (result: TransportResult<HttpRequest | null>) => {
      if (settled) {
        return
      }

      settled = true
      socket.off('data', onData)
      socket.off('end', onEnd)
      socket.off('close', onClose)
      resolve(result)
    }

    const parseHead = (): TransportResult<RequestHead | undefined> => {
      const terminator = buffered.indexOf(HEAD_TERMINATOR)
      const headLength = terminator === -1 ? buffered.length : terminator + HEAD_TERMINATOR.length
      if (headLength > limits.maxHeadBytes) {
        return err(headerFieldsTooLarge('request_head_too_large', 'Request head exceeds the configured limit'))
      }

      if (terminator === -1) {
        return ok(undefined)
      }

      const parsed = parseRequestHead(buffered.subarray(0, terminator).toString('latin1'))
      if (!parsed.ok) {
        return parsed
      }

      const length = resolveBodyLength(parsed.value.headers)
      if (!length.ok) {
        return length
      }

      if (length.value > limits.maxBodyBytes) {
        return err(payloadTooLarge('request_body_too_large', 'Request body exceeds the configured limit'))
      }

      bodyOffset = headLength
      bodyLength = length.value
      return ok(parsed.value)
    }

    const onData = (chunk: Buffer) => {
      buffered = Buffer.concat([buffered, chunk])

      if (!head) {
        const parsed = parseHead()
        if (!parsed.ok) {
          finish(parsed)
          return
        }

        head = parsed.value
        if (!head) {
          return
        }
      }

      if (buffered.length - bodyOffset >= bodyLength) {
        finish(ok({...head, body: Buffer.from(buffered.subarray(bodyOffset, bodyOffset + bodyLength))}))
      }
    }

    const onEnd = () => {
      finish(
        buffered.length === 0
          ? ok(null)
          : err(badRequest('request_incomplete', 'Connection closed before the request was complete'))
      )
    }

    // A reset or destroyed socket has nobody left to answer.
    const onClose = () => {
      finish(ok(null))
    }

    socket.on('data', onData)
    socket.on('end', onEnd)
    socket.on('close', onClose)
  })
