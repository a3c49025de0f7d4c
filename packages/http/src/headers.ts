import {err, ok, type Result} from './result';

export type Header = {
  name: string;
  value: string;
};

/** Ordered header fields. Duplicate names are kept as separate entries. */
export type HeaderList = Header[];

const HTTP_HEADER_NAME_REGEX = /^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/;

export const normalizeHeaderName = (name: string): Result<string, string> => {
  const normalizedName = name.trim().toLowerCase();
  if (!HTTP_HEADER_NAME_REGEX.test(normalizedName)) {
    return err(`Invalid header name: ${name}`);
  }

  return ok(normalizedName);
};

export const validateHeaderValue = (value: string): Result<string, string> => {
  if (/[\r\n]/u.test(value)) {
    return err('Header values must not contain CR or LF');
  }

  return ok(value.trim());
};

export const getHeaderValues = (headers: HeaderList, name: string) => {
  const wanted = name.toLowerCase();
  return headers.filter(header => header.name.toLowerCase() === wanted).map(header => header.value);
};

export const getHeader = (headers: HeaderList, name: string): string | undefined => getHeaderValues(headers, name)[0];

export const appendHeader = (headers: HeaderList, name: string, value: string): HeaderList => [
  ...headers,
  {name, value}
];
