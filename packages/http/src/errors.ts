import {textResponse} from './response';

export type HttpErrorStatus = 400 | 404 | 413 | 431 | 500 | 501 | 505;

export class HttpError extends Error {
  public readonly code: string;
  public readonly status: HttpErrorStatus;

  public constructor({code, message, status}: {code: string; message: string; status: HttpErrorStatus}) {
    super(message);
    this.name = 'HttpError';
    this.code = code;
    this.status = status;
  }
}

export const badRequest = (code: string, message: string) => new HttpError({code, message, status: 400});

export const notFound = (code: string, message: string) => new HttpError({code, message, status: 404});

export const payloadTooLarge = (code: string, message: string) => new HttpError({code, message, status: 413});

export const headerFieldsTooLarge = (code: string, message: string) =>
  new HttpError({code, message, status: 431});

export const internalServerError = (code: string, message: string) =>
  new HttpError({code, message, status: 500});

export const notImplemented = (code: string, message: string) => new HttpError({code, message, status: 501});

export const httpVersionNotSupported = (code: string, message: string) =>
  new HttpError({code, message, status: 505});

export const isHttpError = (value: unknown): value is HttpError => value instanceof HttpError;

export const httpErrorResponse = (error: HttpError) => textResponse(error.status, error.message);
