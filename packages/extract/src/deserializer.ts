import {err, ok} from '@lattice/http';

import {
  message,
  parseError,
  parseErrorAtIndex,
  parseErrorAtKey,
  unsupportedType,
  wrongNumberOfParameters,
  type PathResult
} from './errors';
import type {InferPath, PathShape, ScalarShape} from './shapes';

export type DecodedCapture = {
  readonly key: string;
  readonly value: string;
};

type Location = {at: 'key'; key: string} | {at: 'index'; index: number};

const parseScalar = ({
  shape,
  value,
  location
}: {
  shape: ScalarShape<unknown>;
  value: string;
  location?: Location;
}): PathResult<unknown> => {
  const outcome = shape.parse(value);
  if (outcome.ok) {
    return ok(outcome.value);
  }

  if (outcome.message !== undefined) {
    return err(message(outcome.message));
  }

  if (!location) {
    return err(parseError({value, expectedType: shape.name}));
  }

  return err(
    location.at === 'key'
      ? parseErrorAtKey({key: location.key, value, expectedType: shape.name})
      : parseErrorAtIndex({index: location.index, value, expectedType: shape.name})
  );
};

// Element or value position inside an aggregate: scalars and pairs only.
const decodeNested = ({
  shape,
  capture,
  location
}: {
  shape: PathShape;
  capture: DecodedCapture;
  location: Location;
}): PathResult<unknown> => {
  switch (shape.kind) {
    case 'scalar':
      return parseScalar({shape, value: capture.value, location});
    case 'pair': {
      const key = parseScalar({shape: shape.key, value: capture.key, location});
      if (!key.ok) {
        return key;
      }

      const value = parseScalar({shape: shape.value, value: capture.value, location});
      if (!value.ok) {
        return value;
      }

      return ok([key.value, value.value]);
    }
    case 'tuple':
    case 'list':
    case 'map':
    case 'record':
      return err(unsupportedType({name: shape.name}));
  }
};

const decodeSequence = (
  entries: ReadonlyArray<{capture: DecodedCapture; shape: PathShape}>
): PathResult<unknown[]> => {
  const values: unknown[] = [];
  for (const [index, {capture, shape}] of entries.entries()) {
    const decoded = decodeNested({shape, capture, location: {at: 'index', index}});
    if (!decoded.ok) {
      return decoded;
    }

    values.push(decoded.value);
  }

  return ok(values);
};

const decodeRecord = (
  captures: readonly DecodedCapture[],
  fields: Readonly<Record<string, PathShape>>
): PathResult<Record<string, unknown>> => {
  const fieldNames = Object.keys(fields);
  if (captures.length !== fieldNames.length) {
    return err(wrongNumberOfParameters({got: captures.length, expected: fieldNames.length}));
  }

  const decodedFields = new Map<string, unknown>();
  for (const capture of captures) {
    // Captures with no matching field are ignored; the arity check already ran.
    if (!Object.hasOwn(fields, capture.key)) {
      continue;
    }

    const decoded = decodeNested({shape: fields[capture.key], capture, location: {at: 'key', key: capture.key}});
    if (!decoded.ok) {
      return decoded;
    }

    decodedFields.set(capture.key, decoded.value);
  }

  const missing = fieldNames.find(name => !decodedFields.has(name));
  if (missing !== undefined) {
    return err(message(`missing field \`${missing}\``));
  }

  return ok(Object.fromEntries(fieldNames.map(name => [name, decodedFields.get(name)])));
};

const decodeMap = (captures: readonly DecodedCapture[], valueShape: PathShape): PathResult<Record<string, unknown>> => {
  const entries: Array<[string, unknown]> = [];
  for (const capture of captures) {
    const decoded = decodeNested({shape: valueShape, capture, location: {at: 'key', key: capture.key}});
    if (!decoded.ok) {
      return decoded;
    }

    entries.push([capture.key, decoded.value]);
  }

  return ok(Object.fromEntries(entries));
};

const decodeCaptures = (captures: readonly DecodedCapture[], shape: PathShape): PathResult<unknown> => {
  switch (shape.kind) {
    case 'scalar': {
      const [only] = captures;
      if (captures.length !== 1 || !only) {
        return err(wrongNumberOfParameters({got: captures.length, expected: 1}));
      }

      return parseScalar({shape, value: only.value});
    }
    case 'pair':
      return err(unsupportedType({name: shape.name}));
    case 'tuple': {
      const {items} = shape;
      if (captures.length !== items.length) {
        return err(wrongNumberOfParameters({got: captures.length, expected: items.length}));
      }

      return decodeSequence(captures.map((capture, index) => ({capture, shape: items[index]})));
    }
    case 'list': {
      const {element} = shape;
      return decodeSequence(captures.map(capture => ({capture, shape: element})));
    }
    case 'map':
      return decodeMap(captures, shape.value);
    case 'record':
      return decodeRecord(captures, shape.fields);
  }
};

/** Decodes already percent-decoded captures, in store order, into the value `shape` describes. */
export const deserializePath = <S extends PathShape>(
  captures: readonly DecodedCapture[],
  shape: S
): PathResult<InferPath<S>> =>
  // decodeCaptures builds its value by walking `shape`, so the result has the shape's inferred type.
  decodeCaptures(captures, shape) as PathResult<InferPath<S>>;
