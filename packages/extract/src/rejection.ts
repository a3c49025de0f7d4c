import {textResponse, type HttpResponse, type IntoResponse} from '@lattice/http';

import {pathErrorBody, pathErrorStatus, renderPathError, type PathErrorKind} from './errors';

/** Rejection produced when path captures cannot be turned into the requested shape. */
export class PathRejection extends Error implements IntoResponse {
  public readonly kind: PathErrorKind;

  public constructor(kind: PathErrorKind) {
    super(renderPathError(kind));
    this.name = 'PathRejection';
    this.kind = kind;
  }

  public get status(): 400 | 500 {
    return pathErrorStatus(this.kind);
  }

  /** The underlying error kind, for callers building their own responses. */
  public intoKind(): PathErrorKind {
    return this.kind;
  }

  public toResponse(): HttpResponse {
    return textResponse(this.status, pathErrorBody(this.kind));
  }
}

export const isPathRejection = (value: unknown): value is PathRejection => value instanceof PathRejection;
