import {z} from 'zod';

/**
 * Outcome of parsing one raw capture. A bare mismatch is reported with the
 * shape's type name; a `message` marks a validation failure raised by the
 * value's own rules and is surfaced verbatim.
 */
export type ScalarOutcome<T> = {ok: true; value: T} | {ok: false; message?: string};

export interface ScalarShape<T> {
  readonly kind: 'scalar';
  readonly name: string;
  readonly parse: (raw: string) => ScalarOutcome<T>;
}

/** One capture decoded as `[key, value]`. Only valid inside an aggregate. */
export interface PairShape<K, V> {
  readonly kind: 'pair';
  readonly name: string;
  readonly key: ScalarShape<K>;
  readonly value: ScalarShape<V>;
}

export interface TupleShape<Items extends readonly PathShape[] = readonly PathShape[]> {
  readonly kind: 'tuple';
  readonly name: string;
  readonly items: Items;
}

export interface ListShape<Element extends PathShape = PathShape> {
  readonly kind: 'list';
  readonly name: string;
  readonly element: Element;
}

export interface MapShape<Value extends PathShape = PathShape> {
  readonly kind: 'map';
  readonly name: string;
  readonly value: Value;
}

export interface RecordShape<Fields extends Readonly<Record<string, PathShape>> = Readonly<Record<string, PathShape>>> {
  readonly kind: 'record';
  readonly name: string;
  readonly fields: Fields;
}

export type PathShape =
  | ScalarShape<unknown>
  | PairShape<unknown, unknown>
  | TupleShape
  | ListShape
  | MapShape
  | RecordShape;

export type InferPath<S> =
  S extends ScalarShape<infer T>
    ? T
    : S extends PairShape<infer K, infer V>
      ? [K, V]
      : S extends TupleShape<infer Items>
        ? {-readonly [I in keyof Items]: InferPath<Items[I]>}
        : S extends ListShape<infer Element>
          ? InferPath<Element>[]
          : S extends MapShape<infer Value>
            ? Record<string, InferPath<Value>>
            : S extends RecordShape<infer Fields>
              ? {-readonly [K in keyof Fields]: InferPath<Fields[K]>}
              : never;

const INTEGER_PATTERN = /^[+-]?\d+$/u;
const NUMBER_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/u;

const UuidSchema = z.uuid();

const matched = <T>(value: T): ScalarOutcome<T> => ({ok: true, value});
const MISMATCH: ScalarOutcome<never> = {ok: false};

const scalar = <T>(name: string, parse: (raw: string) => ScalarOutcome<T>): ScalarShape<T> => ({
  kind: 'scalar',
  name,
  parse
});

const string = (): ScalarShape<string> => scalar<string>('string', raw => matched(raw));

const integer = (): ScalarShape<number> =>
  scalar<number>('integer', raw => {
    if (!INTEGER_PATTERN.test(raw)) {
      return MISMATCH;
    }

    const value = Number(raw);
    return Number.isSafeInteger(value) ? matched(value) : MISMATCH;
  });

const number = (): ScalarShape<number> =>
  scalar<number>('number', raw => {
    if (!NUMBER_PATTERN.test(raw)) {
      return MISMATCH;
    }

    const value = Number(raw);
    return Number.isFinite(value) ? matched(value) : MISMATCH;
  });

const boolean = (): ScalarShape<boolean> =>
  scalar<boolean>('boolean', raw => {
    if (raw === 'true') {
      return matched(true);
    }

    return raw === 'false' ? matched(false) : MISMATCH;
  });

const bigint = (): ScalarShape<bigint> =>
  scalar<bigint>('bigint', raw => (INTEGER_PATTERN.test(raw) ? matched(BigInt(raw)) : MISMATCH));

const uuid = (): ScalarShape<string> =>
  scalar<string>('uuid', raw => (UuidSchema.safeParse(raw).success ? matched(raw) : MISMATCH));

const choice = <const Values extends readonly [string, ...string[]]>(values: Values): ScalarShape<Values[number]> =>
  scalar<Values[number]>(values.map(value => JSON.stringify(value)).join(' | '), raw => {
    const found = values.find(value => value === raw);
    if (found !== undefined) {
      return matched(found);
    }

    const expected = values.map(value => `\`${value}\``).join(', ');
    return {ok: false, message: `unknown variant \`${raw}\`, expected one of ${expected}`};
  });

/** A scalar validated by an arbitrary zod schema; failures surface the issue messages. */
const schema = <T>(name: string, validator: z.ZodType<T>): ScalarShape<T> =>
  scalar<T>(name, raw => {
    const parsed = validator.safeParse(raw);
    if (parsed.success) {
      return matched(parsed.data);
    }

    return {ok: false, message: parsed.error.issues.map(issue => issue.message).join('; ')};
  });

const pair = <K, V>(key: ScalarShape<K>, value: ScalarShape<V>): PairShape<K, V> => ({
  kind: 'pair',
  name: `[${key.name}, ${value.name}]`,
  key,
  value
});

const tuple = <const Items extends readonly PathShape[]>(items: Items): TupleShape<Items> => ({
  kind: 'tuple',
  name: `[${items.map(item => item.name).join(', ')}]`,
  items
});

const list = <Element extends PathShape>(element: Element): ListShape<Element> => ({
  kind: 'list',
  name: `Array<${element.name}>`,
  element
});

const map = <Value extends PathShape>(value: Value): MapShape<Value> => ({
  kind: 'map',
  name: `Record<string, ${value.name}>`,
  value
});

const record = <Fields extends Readonly<Record<string, PathShape>>>(fields: Fields): RecordShape<Fields> => ({
  kind: 'record',
  name: `{ ${Object.entries(fields)
    .map(([field, shape]) => `${field}: ${shape.name}`)
    .join('; ')} }`,
  fields
});

export const path = {
  string,
  integer,
  number,
  boolean,
  bigint,
  uuid,
  choice,
  schema,
  pair,
  tuple,
  list,
  map,
  record
};
