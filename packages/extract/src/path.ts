import {err, ok, type Extractor, type Result} from '@lattice/http';

import {capturesKey, type ReadonlyCaptureStore} from './captures';
import {deserializePath, type DecodedCapture} from './deserializer';
import {invalidUtf8InPathParam, type PathResult} from './errors';
import {decodeCapture} from './percent';
import {PathRejection} from './rejection';
import type {InferPath, PathShape} from './shapes';

export const decodeCaptures = (captures: ReadonlyCaptureStore): PathResult<DecodedCapture[]> => {
  const decoded: DecodedCapture[] = [];
  for (const {key, value} of captures) {
    const text = decodeCapture(value);
    if (text === undefined) {
      return err(invalidUtf8InPathParam({key}));
    }

    decoded.push({key, value: text});
  }

  return ok(decoded);
};

export const extractPath = <S extends PathShape>(
  captures: ReadonlyCaptureStore,
  shape: S
): Result<InferPath<S>, PathRejection> => {
  const decoded = decodeCaptures(captures);
  if (!decoded.ok) {
    return err(new PathRejection(decoded.error));
  }

  const deserialized = deserializePath(decoded.value, shape);
  if (!deserialized.ok) {
    return err(new PathRejection(deserialized.error));
  }

  return deserialized;
};

/**
 * Extractor reading the request's CaptureStore. Throws when no store is
 * installed, which only happens when the server did not set up the request.
 */
export const pathParams =
  <S extends PathShape>(shape: S): Extractor<InferPath<S>> =>
  ({extensions}) =>
    extractPath(extensions.require(capturesKey), shape);
