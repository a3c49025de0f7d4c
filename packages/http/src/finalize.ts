import {appendHeader} from './headers';
import type {HttpVersion} from './request';
import type {HttpResponse} from './response';

/**
 * Last step before a response is written: appends `content-length` computed
 * from the body and stamps the inbound request's protocol version.
 */
export const finalizeResponse = ({
  response,
  version
}: {
  response: HttpResponse;
  version: HttpVersion;
}): HttpResponse => ({
  ...response,
  version,
  headers: appendHeader(response.headers, 'content-length', String(response.body.length))
});
