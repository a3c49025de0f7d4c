import {createResponse, finalizeResponse, textResponse} from '@lattice/http'
import {describe, expect, it} from 'vitest'

import {resolveBodyLength} from '../transport/framing'
import {parseRequestHead} from '../transport/reader'
import {serializeResponse} from '../transport/writer'

describe('parseRequestHead', () => {
  it('parses the request line and normalizes header fields', () => {
    expect(parseRequestHead('GET /users/7?view=full HTTP/1.1\r\nHost: example.test\r\nX-Trace:  abc ')).toEqual({
      ok: true,
      value: {
        method: 'GET',
        target: '/users/7?view=full',
        path: '/users/7',
        query: 'view=full',
        version: 'HTTP/1.1',
        headers: [
          {name: 'host', value: 'example.test'},
          {name: 'x-trace', value: 'abc'}
        ]
      }
    })
  })

  it('keeps percent-encoded paths untouched', () => {
    const parsed = parseRequestHead('GET /files/caf%C3%A9 HTTP/1.0')
    expect(parsed.ok && parsed.value.path).toBe('/files/caf%C3%A9')
    expect(parsed.ok && parsed.value.query).toBeUndefined()
  })

  it.each([
    ['GET /  HTTP/1.1', 'request_line_invalid'],
    ['GET http://example.test/ HTTP/1.1', 'request_line_invalid'],
    ['GET / HTTX/1.1', 'request_line_invalid'],
    ['G(T / HTTP/1.1', 'request_line_invalid'],
    ['GET / HTTP/1.1\r\nA: b\r\n c', 'header_invalid'],
    ['GET / HTTP/1.1\r\nHost : example.test', 'header_invalid'],
    ['GET / HTTP/1.1\r\nBad Name: x', 'header_invalid'],
    ['GET / HTTP/1.1\r\nno-colon', 'header_invalid']
  ])('rejects %j as %s', (head, code) => {
    expect(parseRequestHead(head)).toEqual({ok: false, error: expect.objectContaining({code, status: 400})})
  })

  it('rejects unsupported protocol versions with 505', () => {
    expect(parseRequestHead('GET / HTTP/2.0')).toEqual({
      ok: false,
      error: expect.objectContaining({code: 'http_version_unsupported', status: 505})
    })
  })
})

describe('resolveBodyLength', () => {
  it('reads a single Content-Length', () => {
    expect(resolveBodyLength([])).toEqual({ok: true, value: 0})
    expect(resolveBodyLength([{name: 'content-length', value: '5'}])).toEqual({ok: true, value: 5})
  })

  it('rejects ambiguous or unsupported framing', () => {
    expect(
      resolveBodyLength([
        {name: 'content-length', value: '5'},
        {name: 'content-length', value: '5'}
      ])
    ).toEqual({ok: false, error: expect.objectContaining({code: 'ambiguous_framing_multiple_content_length'})})
    expect(resolveBodyLength([{name: 'content-length', value: '-1'}])).toEqual({
      ok: false,
      error: expect.objectContaining({code: 'ambiguous_framing_invalid_content_length', status: 400})
    })
    expect(resolveBodyLength([{name: 'transfer-encoding', value: 'chunked'}])).toEqual({
      ok: false,
      error: expect.objectContaining({code: 'transfer_encoding_unsupported', status: 501})
    })
  })
})

describe('serializeResponse', () => {
  it('writes the status line, headers in order and the body', () => {
    const response = finalizeResponse({response: textResponse(200, 'hi'), version: 'HTTP/1.0'})
    const serialized = serializeResponse(response)

    expect(serialized.ok && serialized.value.toString('latin1')).toBe(
      'HTTP/1.0 200 OK\r\ncontent-type: text/plain; charset=utf-8\r\ncontent-length: 2\r\n\r\nhi'
    )
  })

  it('leaves the reason phrase empty for unregistered statuses', () => {
    const serialized = serializeResponse(createResponse({status: 599}))
    expect(serialized.ok && serialized.value.toString('latin1')).toBe('HTTP/1.1 599 \r\n\r\n')
  })

  it('refuses invalid statuses and header injection', () => {
    expect(serializeResponse(createResponse({status: 99}))).toEqual({
      ok: false,
      error: expect.objectContaining({code: 'response_status_invalid'})
    })
    expect(
      serializeResponse(createResponse({status: 200, headers: [{name: 'x-note', value: 'a\r\nset-cookie: b'}]}))
    ).toEqual({
      ok: false,
      error: expect.objectContaining({code: 'response_header_invalid', message: 'Header `x-note` contains CR or LF'})
    })
  })
})
