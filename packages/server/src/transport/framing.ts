import {
  badRequest,
  err,
  getHeaderValues,
  notImplemented,
  ok,
  type HeaderList,
  type HttpError,
  type Result
} from '@lattice/http'

export type TransportResult<T> = Result<T, HttpError>

/**
 * Number of body bytes following the head. Only `Content-Length` framing is
 * understood; a request without it has no body.
 */
export const resolveBodyLength = (headers: HeaderList): TransportResult<number> => {
  if (getHeaderValues(headers, 'transfer-encoding').length > 0) {
    return err(notImplemented('transfer_encoding_unsupported', 'Transfer-Encoding is not supported'))
  }

  const contentLengthValues = getHeaderValues(headers, 'content-length')
  if (contentLengthValues.length === 0) {
    return ok(0)
  }

  if (contentLengthValues.length > 1) {
    return err(
      badRequest('ambiguous_framing_multiple_content_length', 'Multiple Content-Length headers are not allowed')
    )
  }

  const [rawContentLength] = contentLengthValues
  if (!/^\d+$/u.test(rawContentLength)) {
    return err(
      badRequest('ambiguous_framing_invalid_content_length', 'Content-Length must be a non-negative integer')
    )
  }

  const parsedContentLength = Number.parseInt(rawContentLength, 10)
  if (!Number.isSafeInteger(parsedContentLength)) {
    return err(badRequest('ambiguous_framing_invalid_content_length', 'Content-Length is out of range'))
  }

  return ok(parsedContentLength)
}
