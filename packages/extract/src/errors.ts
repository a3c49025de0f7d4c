import type {Result} from '@lattice/http';

export const pathErrorKinds = [
  'wrong_number_of_parameters',
  'parse_error_at_key',
  'parse_error_at_index',
  'parse_error',
  'invalid_utf8_in_path_param',
  'unsupported_type',
  'message'
] as const;

export type PathErrorKindName = (typeof pathErrorKinds)[number];

/** Every way turning path captures into a value can fail. The set is closed. */
export type PathErrorKind =
  | {kind: 'wrong_number_of_parameters'; got: number; expected: number}
  /** A value under a named key (record field or map entry) did not parse. */
  | {kind: 'parse_error_at_key'; key: string; value: string; expectedType: string}
  /** A value at a position of a sequence did not parse. */
  | {kind: 'parse_error_at_index'; index: number; value: string; expectedType: string}
  /** The single value of a scalar target did not parse. */
  | {kind: 'parse_error'; value: string; expectedType: string}
  | {kind: 'invalid_utf8_in_path_param'; key: string}
  /** The target nests aggregates the decoder cannot fill. A programming error. */
  | {kind: 'unsupported_type'; name: string}
  /** Anything raised by a value's own validation. */
  | {kind: 'message'; message: string};

export type PathResult<T> = Result<T, PathErrorKind>;

export const wrongNumberOfParameters = ({got, expected}: {got: number; expected: number}): PathErrorKind => ({
  kind: 'wrong_number_of_parameters',
  got,
  expected
});

export const parseErrorAtKey = ({
  key,
  value,
  expectedType
}: {
  key: string;
  value: string;
  expectedType: string;
}): PathErrorKind => ({kind: 'parse_error_at_key', key, value, expectedType});

export const parseErrorAtIndex = ({
  index,
  value,
  expectedType
}: {
  index: number;
  value: string;
  expectedType: string;
}): PathErrorKind => ({kind: 'parse_error_at_index', index, value, expectedType});

export const parseError = ({value, expectedType}: {value: string; expectedType: string}): PathErrorKind => ({
  kind: 'parse_error',
  value,
  expectedType
});

export const invalidUtf8InPathParam = ({key}: {key: string}): PathErrorKind => ({
  kind: 'invalid_utf8_in_path_param',
  key
});

export const unsupportedType = ({name}: {name: string}): PathErrorKind => ({kind: 'unsupported_type', name});

export const message = (text: string): PathErrorKind => ({kind: 'message', message: text});

const MULTIPLE_PARAMETERS_NOTE =
  '. Note that multiple parameters must be extracted with a tuple `path.tuple([...])` or a record `path.record({...})`';

// Values are shown quoted and escaped so that empty or blank segments stay visible.
const quote = (value: string) => JSON.stringify(value);

export const renderPathError = (error: PathErrorKind): string => {
  switch (error.kind) {
    case 'message':
      return error.message;
    case 'invalid_utf8_in_path_param':
      return `Invalid UTF-8 in \`${error.key}\``;
    case 'wrong_number_of_parameters': {
      const text = `Wrong number of path arguments for \`Path\`. Expected ${error.expected} but got ${error.got}`;
      return error.expected === 1 ? `${text}${MULTIPLE_PARAMETERS_NOTE}` : text;
    }
    case 'unsupported_type':
      return `Unsupported type \`${error.name}\``;
    case 'parse_error_at_key':
      return `Cannot parse \`${error.key}\` with value \`${quote(error.value)}\` to a \`${error.expectedType}\``;
    case 'parse_error':
      return `Cannot parse \`${quote(error.value)}\` to a \`${error.expectedType}\``;
    case 'parse_error_at_index':
      return `Cannot parse value at index ${error.index} with value \`${quote(error.value)}\` to a \`${error.expectedType}\``;
  }
};

/**
 * Malformed client input maps to 400. Arity and unsupported shapes come from
 * the server's own route declarations and map to 500.
 */
export const pathErrorStatus = (error: PathErrorKind): 400 | 500 => {
  switch (error.kind) {
    case 'message':
    case 'invalid_utf8_in_path_param':
    case 'parse_error':
    case 'parse_error_at_index':
    case 'parse_error_at_key':
      return 400;
    case 'wrong_number_of_parameters':
    case 'unsupported_type':
      return 500;
  }
};

export const pathErrorBody = (error: PathErrorKind): string => {
  const rendered = renderPathError(error);
  return pathErrorStatus(error) === 400 ? `Invalid URL: ${rendered}` : rendered;
};
