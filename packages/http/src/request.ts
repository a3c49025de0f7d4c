import type {HeaderList} from './headers';

export const httpVersions = ['HTTP/1.0', 'HTTP/1.1'] as const;

export type HttpVersion = (typeof httpVersions)[number];

export const isHttpVersion = (value: string): value is HttpVersion =>
  httpVersions.some(version => version === value);

export type HttpRequest = {
  method: string;
  /** Request target exactly as it appeared on the request line. */
  target: string;
  /** Path component of the target, still percent-encoded. */
  path: string;
  query: string | undefined;
  version: HttpVersion;
  headers: HeaderList;
  body: Buffer;
};
