import type {HeaderList} from './headers';
import type {HttpVersion} from './request';

export type HttpResponse = {
  status: number;
  headers: HeaderList;
  body: Buffer;
  version: HttpVersion;
};

/** Anything that knows how to render itself as a response, such as an extractor rejection. */
export interface IntoResponse {
  toResponse(): HttpResponse;
}

/** Values a handler may return. A tuple pairs a status with a text or binary body. */
export type Responder = HttpResponse | IntoResponse | string | Buffer | [number, string | Buffer];

export const TEXT_CONTENT_TYPE = 'text/plain; charset=utf-8';
export const BINARY_CONTENT_TYPE = 'application/octet-stream';

export const createResponse = ({
  status,
  headers = [],
  body = Buffer.alloc(0),
  version = 'HTTP/1.1'
}: {
  status: number;
  headers?: HeaderList;
  body?: Buffer;
  version?: HttpVersion;
}): HttpResponse => ({status, headers, body, version});

export const textResponse = (status: number, text: string) =>
  createResponse({
    status,
    headers: [{name: 'content-type', value: TEXT_CONTENT_TYPE}],
    body: Buffer.from(text, 'utf8')
  });

export const bytesResponse = (status: number, bytes: Buffer) =>
  createResponse({
    status,
    headers: [{name: 'content-type', value: BINARY_CONTENT_TYPE}],
    body: bytes
  });

export const notFoundResponse = () => textResponse(404, 'Not Found');

const bodyResponse = (status: number, body: string | Buffer) =>
  typeof body === 'string' ? textResponse(status, body) : bytesResponse(status, body);

export const intoResponse = (responder: Responder): HttpResponse => {
  if (typeof responder === 'string' || Buffer.isBuffer(responder)) {
    return bodyResponse(200, responder);
  }

  if (Array.isArray(responder)) {
    const [status, body] = responder;
    return bodyResponse(status, body);
  }

  if ('toResponse' in responder) {
    return responder.toResponse();
  }

  return responder;
};
